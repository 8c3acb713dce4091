import type { TransactionSigner } from "./TransactionSigner.ts"
import { commitmentFromString, hexStringToUint8Array, uint8ArrayToHexString } from "../utils/codec.ts"
import { NetworkError, SerializationError, SigningError } from "../utils/errors.ts"
import { retryRpcCall } from "../utils/rpc.ts"
import type {
	BroadcastMode,
	Commitment,
	LedgerTransport,
	QueryHeight,
	QueryRequest,
	QueryResponse,
	SignedTransaction,
	TxReceipt,
	WriteAccess,
} from "../types/types.ts"

export type ClientOptions = {
	maxRetries?: number
	baseDelayMs?: number
}

export type CreateOptions = ClientOptions & {
	// the address is only known once the transaction executed, so Async is not accepted
	broadcastMode?: Exclude<BroadcastMode, "Async">
}

type ResponseOf<K extends QueryResponse["kind"]> = Extract<QueryResponse, { kind: K }>

/**
 * AccumulatorClient: handle on one accumulator machine behind a LedgerTransport.
 * Writes are signed and broadcast; reads are height-scoped queries.
 */
export class AccumulatorClient {
	readonly address: string
	private readonly transport: LedgerTransport
	private readonly options: ClientOptions

	private constructor(transport: LedgerTransport, address: string, options: ClientOptions = {}) {
		this.transport = transport
		this.address = address
		this.options = options
	}

	/**
	 * Creates a new accumulator owned by the signer.
	 * @returns the attached client and the create transaction's receipt
	 */
	static async create(
		transport: LedgerTransport,
		signer: TransactionSigner,
		writeAccess: WriteAccess,
		options: CreateOptions = {},
	): Promise<{ client: AccumulatorClient; tx: TxReceipt }> {
		const tx = await signer.sign({ kind: "create", writeAccess })
		const receipt = await broadcastSigned(transport, signer, tx, options.broadcastMode ?? "Commit", options)
		if (receipt.status === "submitted" || receipt.status === "failed" || receipt.result.kind !== "create") {
			throw new SerializationError(`Create transaction ${receipt.hash} returned no address`)
		}
		console.log(`[Accumulator] \u{1F195} Created accumulator ${receipt.result.address}`)
		return { client: new AccumulatorClient(transport, receipt.result.address, options), tx: receipt }
	}

	static attach(transport: LedgerTransport, address: string, options: ClientOptions = {}): AccumulatorClient {
		return new AccumulatorClient(transport, address, options)
	}

	/**
	 * Appends `payload`. With Async the receipt carries only the transaction hash; with
	 * Sync or Commit it carries the leaf index and new root. Read the leaf index from the
	 * receipt: concurrent writers make any locally predicted index unreliable.
	 * An Async push that the ledger later rejects leaves the signer ahead; call
	 * `signer.resync()` after seeing a failed receipt.
	 */
	async push(
		signer: TransactionSigner,
		payload: Uint8Array,
		broadcastMode: BroadcastMode = "Commit",
	): Promise<TxReceipt> {
		const tx = await signer.sign({ kind: "append", address: this.address, payload: uint8ArrayToHexString(payload) })
		return broadcastSigned(this.transport, signer, tx, broadcastMode, this.options)
	}

	async leaf(index: number, height: QueryHeight = "committed"): Promise<Uint8Array> {
		const response = await this.query("leaf", { kind: "leaf", address: this.address, index, height })
		return hexStringToUint8Array(response.payload)
	}

	async count(height: QueryHeight = "committed"): Promise<number> {
		const response = await this.query("count", { kind: "count", address: this.address, height })
		return response.count
	}

	async peaks(height: QueryHeight = "committed"): Promise<Commitment[]> {
		const response = await this.query("peaks", { kind: "peaks", address: this.address, height })
		return response.peaks.map(commitmentFromString)
	}

	async root(height: QueryHeight = "committed"): Promise<Commitment> {
		const response = await this.query("root", { kind: "root", address: this.address, height })
		return commitmentFromString(response.root)
	}

	private async query<K extends QueryResponse["kind"]>(kind: K, request: QueryRequest): Promise<ResponseOf<K>> {
		const response = await retryRpcCall(
			() => this.transport.query(request),
			this.options.maxRetries,
			this.options.baseDelayMs,
		)
		const actual = response.kind
		if (!isResponseOf(response, kind)) {
			throw new SerializationError(`Expected a ${kind} response, got ${actual}`)
		}
		return response
	}
}

function isResponseOf<K extends QueryResponse["kind"]>(response: QueryResponse, kind: K): response is ResponseOf<K> {
	return response.kind === kind
}

/**
 * A transaction rejected for its signature, sequence or payload never consumed its
 * sequence, so the signer is re-synced with the ledger before the error is rethrown.
 */
async function broadcastSigned(
	transport: LedgerTransport,
	signer: TransactionSigner,
	tx: SignedTransaction,
	mode: BroadcastMode,
	options: ClientOptions,
): Promise<TxReceipt> {
	try {
		return await broadcastWithRetry(transport, tx, mode, options)
	} catch (err) {
		if (err instanceof SigningError || err instanceof SerializationError) {
			try {
				await signer.resync(transport)
			} catch (resyncErr) {
				console.warn(`[Accumulator] \u{26A0}\u{FE0F} Could not resync sequence for ${signer.address}:`, resyncErr)
			}
		}
		throw err
	}
}

/**
 * Only retryable NetworkErrors are retried: those mean the transaction never reached
 * the ledger. Resending the same signed transaction is then safe, since at most one
 * copy can pass the sequence check.
 */
async function broadcastWithRetry(
	transport: LedgerTransport,
	tx: SignedTransaction,
	mode: BroadcastMode,
	options: ClientOptions,
): Promise<TxReceipt> {
	try {
		return await retryRpcCall(() => transport.broadcast(tx, mode), options.maxRetries, options.baseDelayMs)
	} catch (err) {
		if (err instanceof NetworkError) {
			console.error(`[Accumulator] \u{274C} Broadcast failed after retries:`, err.message)
		}
		throw err
	}
}
