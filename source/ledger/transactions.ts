import { keccak256, toUtf8Bytes, verifyMessage } from "ethers"
import { SerializationError, SigningError } from "../utils/errors.ts"
import type { SignedTransaction, TxBody } from "../types/types.ts"

/**
 * Canonical text that gets signed. Keys are written in a fixed order so that the
 * signer and the ledger always hash the same bytes.
 */
export function serializeTxBody(body: TxBody): string {
	switch (body.kind) {
		case "create":
			return JSON.stringify({
				kind: body.kind,
				from: body.from,
				sequence: body.sequence,
				writeAccess: body.writeAccess,
			})
		case "append":
			return JSON.stringify({
				kind: body.kind,
				from: body.from,
				sequence: body.sequence,
				address: body.address,
				payload: body.payload,
			})
	}
}

export function hashTransaction(tx: SignedTransaction): string {
	return keccak256(toUtf8Bytes(`${serializeTxBody(tx.body)}:${tx.signature}`))
}

// EIP-191 personal-message recovery
export function recoverSigner(tx: SignedTransaction): string {
	try {
		return verifyMessage(serializeTxBody(tx.body), tx.signature)
	} catch (e) {
		throw new SigningError("Malformed transaction signature", e)
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

// Validates a transaction that arrived as untyped JSON (storage, or a remote caller)
export function parseSignedTransaction(value: unknown): SignedTransaction {
	if (!isRecord(value) || typeof value.signature !== "string" || !isRecord(value.body)) {
		throw new SerializationError("Transaction must have a body and a signature")
	}
	const { body, signature } = value
	if (typeof body.from !== "string" || typeof body.sequence !== "number") {
		throw new SerializationError("Transaction body must have from and sequence")
	}
	if (body.kind === "create") {
		if (body.writeAccess !== "OnlyOwner" && body.writeAccess !== "Public") {
			throw new SerializationError(`Unknown write access ${String(body.writeAccess)}`)
		}
		return {
			body: { kind: "create", from: body.from, sequence: body.sequence, writeAccess: body.writeAccess },
			signature,
		}
	}
	if (body.kind === "append") {
		if (typeof body.address !== "string" || typeof body.payload !== "string") {
			throw new SerializationError("Append body must have address and payload")
		}
		return {
			body: {
				kind: "append",
				from: body.from,
				sequence: body.sequence,
				address: body.address,
				payload: body.payload,
			},
			signature,
		}
	}
	throw new SerializationError(`Unknown transaction kind ${String(body.kind)}`)
}
