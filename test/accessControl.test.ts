import { test, expect } from "vitest"
import { getAddress } from "ethers"
import { canWrite, assertCanWrite, parseWriteAccess, normalizeIdentity } from "../source/accumulator/accessControl.ts"
import { PermissionDeniedError, SerializationError } from "../source/utils/errors.ts"

const OWNER = "0xabcdef0123456789abcdef0123456789abcdef01"
const OTHER = "0x1111111111111111111111111111111111111111"

test("OnlyOwner admits exactly the owner, whatever the address casing", () => {
	expect(canWrite(OWNER, "OnlyOwner", OWNER)).toBe(true)
	expect(canWrite(getAddress(OWNER), "OnlyOwner", OWNER)).toBe(true)
	expect(canWrite(OTHER, "OnlyOwner", OWNER)).toBe(false)
	expect(canWrite("not-an-address", "OnlyOwner", OWNER)).toBe(false)
})

test("Public admits any caller", () => {
	expect(canWrite(OTHER, "Public", OWNER)).toBe(true)
	expect(canWrite(OWNER, "Public", OWNER)).toBe(true)
})

test("assertCanWrite throws PermissionDenied for a non-owner", () => {
	expect(() => assertCanWrite(OTHER, "OnlyOwner", OWNER)).toThrow(PermissionDeniedError)
	expect(() => assertCanWrite(OWNER, "OnlyOwner", OWNER)).not.toThrow()
})

test("parseWriteAccess accepts names and the public-write flag", () => {
	expect(parseWriteAccess("OnlyOwner")).toBe("OnlyOwner")
	expect(parseWriteAccess("public")).toBe("Public")
	expect(parseWriteAccess(true)).toBe("Public")
	expect(parseWriteAccess(false)).toBe("OnlyOwner")
	expect(() => parseWriteAccess("everyone")).toThrow(SerializationError)
})

test("normalizeIdentity checksums addresses and rejects anything else", () => {
	expect(normalizeIdentity(OWNER)).toBe(getAddress(OWNER))
	expect(() => normalizeIdentity("0x1234")).toThrow(SerializationError)
})
