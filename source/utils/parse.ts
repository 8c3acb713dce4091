import { InvalidHeightError, SerializationError } from "./errors.ts"
import type { BroadcastMode, QueryHeight } from "../types/types.ts"

// "committed", "pending" or a block height
export function parseQueryHeight(value: string): QueryHeight {
	const trimmed = value.trim().toLowerCase()
	if (trimmed === "committed" || trimmed === "pending") return trimmed
	if (!/^\d+$/.test(trimmed)) throw new InvalidHeightError(`Invalid query height "${value}"`)
	return Number(trimmed)
}

export function parseBroadcastMode(value: string | undefined): BroadcastMode {
	switch ((value ?? "commit").trim().toLowerCase()) {
		case "async":
			return "Async"
		case "sync":
			return "Sync"
		case "commit":
			return "Commit"
		default:
			throw new SerializationError(`Unknown broadcast mode "${value}" (expected async, sync or commit)`)
	}
}
