export const ERR = {
	PERMISSION_DENIED: "PERMISSION_DENIED",
	NOT_FOUND: "NOT_FOUND",
	INVALID_HEIGHT: "INVALID_HEIGHT",
	SERIALIZATION: "SERIALIZATION",
	NETWORK: "NETWORK",
	SIGNING: "SIGNING",
} as const

export type ErrorCode = (typeof ERR)[keyof typeof ERR]

export class AccumulatorError extends Error {
	readonly code: ErrorCode

	constructor(code: ErrorCode, message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause })
		this.name = "AccumulatorError"
		this.code = code
	}
}

// Write policy violation
export class PermissionDeniedError extends AccumulatorError {
	constructor(message: string) {
		super(ERR.PERMISSION_DENIED, message)
		this.name = "PermissionDeniedError"
	}
}

// Unknown address or out-of-range leaf index
export class NotFoundError extends AccumulatorError {
	constructor(message: string) {
		super(ERR.NOT_FOUND, message)
		this.name = "NotFoundError"
	}
}

export class InvalidHeightError extends AccumulatorError {
	constructor(message: string) {
		super(ERR.INVALID_HEIGHT, message)
		this.name = "InvalidHeightError"
	}
}

// Malformed or oversized input, rejected before any state change
export class SerializationError extends AccumulatorError {
	constructor(message: string, cause?: unknown) {
		super(ERR.SERIALIZATION, message, cause)
		this.name = "SerializationError"
	}
}

/**
 * Transport failure. Retryable unless raised after the transaction reached the
 * ledger (e.g. a timed-out wait for commit), where a resend could only be rejected.
 */
export class NetworkError extends AccumulatorError {
	readonly retryable: boolean

	constructor(message: string, cause?: unknown, retryable = true) {
		super(ERR.NETWORK, message, cause)
		this.name = "NetworkError"
		this.retryable = retryable
	}
}

export class SigningError extends AccumulatorError {
	constructor(message: string, cause?: unknown) {
		super(ERR.SIGNING, message, cause)
		this.name = "SigningError"
	}
}

export function isRetryable(err: unknown): boolean {
	return err instanceof NetworkError && err.retryable
}
