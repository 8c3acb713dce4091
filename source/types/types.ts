import type { CID } from "multiformats/cid"

// Every commitment is a CIDv1 (dag-cbor, sha2-256)
export type Commitment = CID

/**
 * Represents a single MMR peak with its CID and height.
 */
export type PeakWithHeight = { cid: Commitment; height: number }

export type MMRAppendResult = {
	leafIndex: number
	root: Commitment
}

export type WriteAccess = "OnlyOwner" | "Public"

export type BroadcastMode = "Async" | "Sync" | "Commit"

// "committed" is the last sealed block, "pending" the block being built
export type QueryHeight = "committed" | "pending" | number

export type SnapshotState = {
	leafCount: number
	peaks: readonly PeakWithHeight[]
}

export type Snapshot = SnapshotState & { height: number }

export interface ChainClock {
	// Highest height a query may name
	tipHeight(): number
}

export type AppendResult = {
	leafIndex: number
	leafCount: number
	root: Commitment
	height: number
}

export type AccumulatorInfo = {
	address: string
	owner: string
	writeAccess: WriteAccess
	createdAtHeight: number
}

// ====================================================
// TRANSACTIONS
// ====================================================

export type CreateTxBody = {
	kind: "create"
	from: string
	sequence: number
	writeAccess: WriteAccess
}

export type AppendTxBody = {
	kind: "append"
	from: string
	sequence: number
	address: string
	// hex, no 0x prefix
	payload: string
}

export type TxBody = CreateTxBody | AppendTxBody

export type SignedTransaction = {
	body: TxBody
	signature: string
}

export type TxResult =
	| { kind: "create"; address: string }
	| { kind: "append"; address: string; leafIndex: number; root: string }

export type TxReceipt =
	| { hash: string; status: "submitted" }
	// height is set when the transaction was included and failed in execution
	| { hash: string; status: "failed"; error: string; height?: number }
	| { hash: string; status: "pending" | "committed"; height: number; result: TxResult }

export type BlockRecord = {
	height: number
	txs: SignedTransaction[]
	results: Array<{ hash: string; ok: boolean; error?: string }>
}

// ====================================================
// QUERIES
// ====================================================

export type QueryRequest =
	| { kind: "count"; address: string; height?: QueryHeight }
	| { kind: "peaks"; address: string; height?: QueryHeight }
	| { kind: "root"; address: string; height?: QueryHeight }
	| { kind: "leaf"; address: string; index: number; height?: QueryHeight }

export type QueryResponse =
	| { kind: "count"; height: number; count: number }
	| { kind: "peaks"; height: number; peaks: string[] }
	| { kind: "root"; height: number; root: string }
	| { kind: "leaf"; height: number; payload: string }

/**
 * Boundary between the façade and whatever orders transactions.
 * The in-process Ledger implements it; a network client would too.
 */
export interface LedgerTransport {
	broadcast(tx: SignedTransaction, mode: BroadcastMode): Promise<TxReceipt>
	query(request: QueryRequest): Promise<QueryResponse>
	getSequence(account: string): Promise<number>
}

// ====================================================
// CONFIG
// ====================================================

export type StorageBackend = "memory" | "sqlite" | "level"

export interface AccumulatorMachineConfig {
	MAX_PAYLOAD_BYTES: number
	BLOCK_INTERVAL_MS: number
	COMMIT_TIMEOUT_MS: number
	STORAGE_BACKEND: StorageBackend
	DB_PATH?: string
	RPC_MAX_RETRIES: number
	RPC_BASE_DELAY_MS: number
}
