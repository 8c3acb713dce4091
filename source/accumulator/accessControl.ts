import { getAddress, isAddress } from "ethers"
import { PermissionDeniedError, SerializationError } from "../utils/errors.ts"
import type { WriteAccess } from "../types/types.ts"

export function canWrite(caller: string, policy: WriteAccess, owner: string): boolean {
	if (policy === "Public") return true
	if (!isAddress(caller) || !isAddress(owner)) return false
	return getAddress(caller) === getAddress(owner)
}

export function assertCanWrite(caller: string, policy: WriteAccess, owner: string): void {
	if (!canWrite(caller, policy, owner)) {
		throw new PermissionDeniedError(`${caller} may not write to an ${policy} accumulator owned by ${owner}`)
	}
}

// Accepts the policy name, or the public-write flag of the create command
export function parseWriteAccess(value: string | boolean): WriteAccess {
	if (typeof value === "boolean") return value ? "Public" : "OnlyOwner"
	switch (value.trim().toLowerCase()) {
		case "onlyowner":
		case "only-owner":
			return "OnlyOwner"
		case "public":
			return "Public"
		default:
			throw new SerializationError(`Unknown write access "${value}" (expected OnlyOwner or Public)`)
	}
}

// Checksummed form of an identity; throws on anything that is not a 20-byte address
export function normalizeIdentity(identity: string): string {
	if (!isAddress(identity)) throw new SerializationError(`Invalid identity address: ${identity}`)
	return getAddress(identity)
}
