import { describe, test, expect } from "vitest"
import { DEFAULT_CONFIG, loadConfigFromEnv } from "../source/utils/config.ts"

describe("loadConfigFromEnv", () => {
	test("falls back to defaults for unset and blank variables", () => {
		expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG)
		expect(loadConfigFromEnv({ MAX_PAYLOAD_BYTES: "  ", DB_PATH: "" })).toEqual(DEFAULT_CONFIG)
	})

	test("reads numbers and the storage backend", () => {
		const config = loadConfigFromEnv({
			MAX_PAYLOAD_BYTES: "64",
			BLOCK_INTERVAL_MS: "0",
			COMMIT_TIMEOUT_MS: "500",
			STORAGE_BACKEND: " SQLite ",
			DB_PATH: " ./data/ledger.sqlite ",
			RPC_MAX_RETRIES: "5",
			RPC_BASE_DELAY_MS: "50",
		})
		expect(config).toEqual({
			MAX_PAYLOAD_BYTES: 64,
			BLOCK_INTERVAL_MS: 0,
			COMMIT_TIMEOUT_MS: 500,
			STORAGE_BACKEND: "sqlite",
			DB_PATH: "./data/ledger.sqlite",
			RPC_MAX_RETRIES: 5,
			RPC_BASE_DELAY_MS: 50,
		})
	})

	test("rejects negative and fractional numbers", () => {
		expect(() => loadConfigFromEnv({ MAX_PAYLOAD_BYTES: "-1" })).toThrow(
			'Config MAX_PAYLOAD_BYTES must be a non-negative integer, got "-1"',
		)
		expect(() => loadConfigFromEnv({ RPC_MAX_RETRIES: "1.5" })).toThrow("RPC_MAX_RETRIES")
		expect(() => loadConfigFromEnv({ BLOCK_INTERVAL_MS: "soon" })).toThrow("BLOCK_INTERVAL_MS")
	})

	test("rejects unknown backends", () => {
		expect(() => loadConfigFromEnv({ STORAGE_BACKEND: "indexeddb" })).toThrow(
			'Config STORAGE_BACKEND must be one of memory, sqlite, level, got "indexeddb"',
		)
	})

	test("requires DB_PATH for persistent backends", () => {
		expect(() => loadConfigFromEnv({ STORAGE_BACKEND: "level" })).toThrow(
			"Config DB_PATH is required when STORAGE_BACKEND is level",
		)
		expect(loadConfigFromEnv({ STORAGE_BACKEND: "level", DB_PATH: "/tmp/db" }).DB_PATH).toBe("/tmp/db")
	})
})
