// utils/codec.ts
import * as dagCbor from "@ipld/dag-cbor"
import { CID } from "multiformats/cid"
import { create as createMultihashDigest } from "multiformats/hashes/digest"
import { sha256 } from "@noble/hashes/sha2"
import type { Commitment } from "../types/types.ts"
import { SerializationError } from "./errors.ts"

const SHA2_256_CODE = 0x12

// Synchronous counterpart of multiformats' sha256 hasher, so the MMR never awaits
export function encodeBlock(value: unknown): { cid: Commitment; bytes: Uint8Array } {
	const encoded = dagCbor.encode(value)
	const digest = createMultihashDigest(SHA2_256_CODE, sha256(encoded))
	const cid = CID.createV1(dagCbor.code, digest)
	return { cid, bytes: encoded }
}

// Leaves are dag-cbor byte strings
export function hashLeaf(payload: Uint8Array): Commitment {
	return encodeBlock(payload).cid
}

// Map(2) { "L": left, "R": right }
export function hashNode(left: Commitment, right: Commitment): Commitment {
	return encodeBlock({ L: left, R: right }).cid
}

// Root of an accumulator with no leaves
export const EMPTY_ROOT: Commitment = encodeBlock(null).cid

export function commitmentFromString(value: string): Commitment {
	try {
		return CID.parse(value)
	} catch (e) {
		throw new SerializationError(`Invalid commitment: ${value}`, e)
	}
}

// Converts a Uint8Array to a lowercase hex string (no 0x prefix).
export function uint8ArrayToHexString(bytes: Uint8Array): string {
	return Array.from(bytes)
		.map((b) => b.toString(16).padStart(2, "0"))
		.join("")
}

// Converts a hex string (with or without 0x prefix) to a Uint8Array.
export function hexStringToUint8Array(hex: string): Uint8Array {
	const clean = hex.startsWith("0x") ? hex.slice(2) : hex
	if (clean.length % 2 !== 0) throw new SerializationError("Hex string must have even length")
	if (!/^[0-9a-fA-F]*$/.test(clean)) throw new SerializationError("Hex string contains non-hex characters")
	const bytes = new Uint8Array(clean.length / 2)
	for (let i = 0; i < clean.length; i += 2) {
		bytes[i / 2] = parseInt(clean.slice(i, i + 2), 16)
	}
	return bytes
}
