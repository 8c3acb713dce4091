import { MachineRegistry } from "../registry/MachineRegistry.ts"
import { normalizeIdentity } from "../accumulator/accessControl.ts"
import type { StorageAdapter } from "../interfaces/StorageAdapter.ts"
import { hexStringToUint8Array, uint8ArrayToHexString } from "../utils/codec.ts"
import { DEFAULT_CONFIG } from "../utils/config.ts"
import { InvalidHeightError, NetworkError, SerializationError, SigningError } from "../utils/errors.ts"
import { hashTransaction, parseSignedTransaction, recoverSigner } from "./transactions.ts"
import type {
	AccumulatorMachineConfig,
	BlockRecord,
	BroadcastMode,
	ChainClock,
	LedgerTransport,
	QueryHeight,
	QueryRequest,
	QueryResponse,
	SignedTransaction,
	TxReceipt,
	TxResult,
} from "../types/types.ts"

export type LedgerOptions = {
	storage?: StorageAdapter
	maxPayloadBytes?: number
	// interval used by start(); 0 means blocks are only produced by produceBlock()
	blockIntervalMs?: number
	// how long a Commit broadcast waits for its block; 0 waits forever
	commitTimeoutMs?: number
}

type Delivered = { hash: string; height: number; result: TxResult }

type CommitWaiter = { height: number; resolve: () => void; reject: (err: Error) => void }

const COMMITTED_HEIGHT_KEY = "meta:committedHeight"
const BLOCK_PREFIX = "block:"

// zero-padded so that a prefix scan returns blocks in height order
function blockKey(height: number): string {
	return BLOCK_PREFIX + height.toString().padStart(12, "0")
}

/**
 * In-process ledger: totally orders transactions, executes them against the
 * machine registry in the open block, and seals blocks.
 * Height 0 is genesis; the open block is always committedHeight + 1.
 */
export class Ledger implements LedgerTransport, ChainClock {
	readonly registry: MachineRegistry

	private committedHeight = 0
	private openBlock: BlockRecord = { height: 1, txs: [], results: [] }
	private readonly sequences = new Map<string, number>()
	private readonly receipts = new Map<string, TxReceipt>()
	private waiters: CommitWaiter[] = []
	private sealing: Promise<unknown> = Promise.resolve()
	private blockTimer?: ReturnType<typeof setInterval>

	private readonly storage?: StorageAdapter
	private readonly maxPayloadBytes: number
	private readonly blockIntervalMs: number
	private readonly commitTimeoutMs: number

	constructor(options: LedgerOptions = {}) {
		this.storage = options.storage
		this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_CONFIG.MAX_PAYLOAD_BYTES
		this.blockIntervalMs = options.blockIntervalMs ?? DEFAULT_CONFIG.BLOCK_INTERVAL_MS
		this.commitTimeoutMs = options.commitTimeoutMs ?? DEFAULT_CONFIG.COMMIT_TIMEOUT_MS
		this.registry = new MachineRegistry({ clock: this, maxPayloadBytes: this.maxPayloadBytes })
	}

	static fromConfig(config: AccumulatorMachineConfig, storage?: StorageAdapter): Ledger {
		return new Ledger({
			storage,
			maxPayloadBytes: config.MAX_PAYLOAD_BYTES,
			blockIntervalMs: config.BLOCK_INTERVAL_MS,
			commitTimeoutMs: config.COMMIT_TIMEOUT_MS,
		})
	}

	// ================================================
	// 		HEIGHTS
	// ================================================

	tipHeight(): number {
		return this.openBlock.height
	}

	getCommittedHeight(): number {
		return this.committedHeight
	}

	getPendingHeight(): number {
		return this.openBlock.height
	}

	resolveHeight(height: QueryHeight = "committed"): number {
		if (height === "committed") return this.committedHeight
		if (height === "pending") return this.openBlock.height
		if (!Number.isInteger(height) || height < 0) throw new InvalidHeightError(`Invalid height ${height}`)
		if (height > this.committedHeight) {
			throw new InvalidHeightError(`Height ${height} is beyond the committed tip ${this.committedHeight}`)
		}
		return height
	}

	// ================================================
	// 		LIFECYCLE
	// ================================================

	/**
	 * Opens storage and replays every sealed block into a fresh registry.
	 * Transactions of a block that was never sealed are gone.
	 */
	async open(): Promise<void> {
		if (!this.storage) return
		if (this.committedHeight !== 0 || this.openBlock.txs.length > 0) {
			throw new Error("Ledger.open() must be called before any transaction is delivered")
		}
		await this.storage.open()

		const storedHeight = Number((await this.storage.get(COMMITTED_HEIGHT_KEY)) ?? 0)
		if (!Number.isInteger(storedHeight) || storedHeight < 0) {
			throw new Error(`Corrupt ${COMMITTED_HEIGHT_KEY}: ${storedHeight}`)
		}

		const blocks = new Map<number, string>()
		const stale: string[] = []
		for await (const { key, value } of this.storage.iterate(BLOCK_PREFIX)) {
			const height = Number(key.slice(BLOCK_PREFIX.length))
			if (!Number.isInteger(height) || height < 1) throw new SerializationError(`Unexpected block key ${key}`)
			// written by a seal that never recorded its height
			if (height > storedHeight) stale.push(key)
			else blocks.set(height, value)
		}
		for (const key of stale) await this.storage.delete(key)

		let replayed = 0
		for (let height = 1; height <= storedHeight; height++) {
			this.openBlock = { height, txs: [], results: [] }
			const raw = blocks.get(height)
			if (raw !== undefined) replayed += this.replayBlock(height, raw)
			this.committedHeight = height
			this.markCommitted(this.openBlock)
		}
		this.openBlock = { height: storedHeight + 1, txs: [], results: [] }
		console.log(`[Ledger] \u{1F4E4} Replayed ${replayed} txs from ${storedHeight} blocks`)
	}

	start(): void {
		if (this.blockTimer || this.blockIntervalMs <= 0) return
		this.blockTimer = setInterval(() => {
			this.produceBlock().catch((err) => console.error("[Ledger] \u{274C} Failed to produce block:", err))
		}, this.blockIntervalMs)
	}

	stop(): void {
		if (this.blockTimer) clearInterval(this.blockTimer)
		this.blockTimer = undefined
	}

	async close(): Promise<void> {
		this.stop()
		await this.sealing
		const pending = this.waiters
		this.waiters = []
		for (const waiter of pending) waiter.reject(new NetworkError("Ledger closed before the block was committed", undefined, false))
		await this.storage?.close()
	}

	// ================================================
	// 		TRANSACTIONS
	// ================================================

	async getSequence(account: string): Promise<number> {
		return this.sequences.get(normalizeIdentity(account)) ?? 0
	}

	getTransaction(hash: string): TxReceipt | undefined {
		return this.receipts.get(hash)
	}

	async broadcast(tx: SignedTransaction, mode: BroadcastMode): Promise<TxReceipt> {
		const hash = hashTransaction(tx)

		if (mode === "Async") {
			const receipt: TxReceipt = { hash, status: "submitted" }
			// a resent copy must not hide the receipt of the one already delivered
			if (!this.receipts.has(hash)) this.receipts.set(hash, receipt)
			setImmediate(() => {
				try {
					this.deliver(tx)
				} catch (err) {
					console.error(`[Ledger] \u{274C} Async tx ${hash} failed:`, err)
					// rejected before inclusion; execution failures already have their receipt
					if (this.receipts.get(hash)?.status === "submitted") {
						this.receipts.set(hash, { hash, status: "failed", error: errorMessage(err) })
					}
				}
			})
			return receipt
		}

		const { height, result } = this.deliver(tx)
		if (mode === "Sync") return { hash, status: "pending", height, result }

		await this.waitForCommit(height)
		return { hash, status: "committed", height, result }
	}

	/**
	 * Checks and executes one transaction in the open block. Signature, sequence and
	 * payload problems reject the transaction outright; execution failures (permission,
	 * unknown address) still consume the sequence and are recorded in the block.
	 */
	private deliver(tx: SignedTransaction): Delivered {
		const hash = hashTransaction(tx)
		const { body } = tx
		const from = normalizeIdentity(body.from)

		const signer = recoverSigner(tx)
		if (signer !== from) throw new SigningError(`Transaction signed by ${signer}, not by ${from}`)

		const expected = this.sequences.get(from) ?? 0
		if (body.sequence !== expected) {
			throw new SigningError(`Invalid sequence ${body.sequence} for ${from}; expected ${expected}`)
		}

		const payload = body.kind === "append" ? hexStringToUint8Array(body.payload) : undefined
		if (payload && payload.length > this.maxPayloadBytes) {
			throw new SerializationError(`Payload is ${payload.length} bytes; the maximum is ${this.maxPayloadBytes}`)
		}
		this.sequences.set(from, expected + 1)

		const height = this.openBlock.height
		this.openBlock.txs.push(tx)
		try {
			const result = this.execute(tx, from, height, payload)
			this.openBlock.results.push({ hash, ok: true })
			this.receipts.set(hash, { hash, status: "pending", height, result })
			return { hash, height, result }
		} catch (err) {
			const error = errorMessage(err)
			this.openBlock.results.push({ hash, ok: false, error })
			this.receipts.set(hash, { hash, status: "failed", height, error })
			throw err
		}
	}

	private execute(tx: SignedTransaction, from: string, height: number, payload?: Uint8Array): TxResult {
		const { body } = tx
		if (body.kind === "create") {
			const address = this.registry.create(body.writeAccess, from, height)
			console.log(`[Ledger] \u{1F195} Created ${body.writeAccess} accumulator ${address} for ${from}`)
			return { kind: "create", address }
		}
		if (!payload) throw new SerializationError("Append transaction without payload")
		const machine = this.registry.attach(body.address)
		const { leafIndex, root } = machine.append(from, payload, height)
		return { kind: "append", address: machine.address, leafIndex, root: root.toString() }
	}

	private replayBlock(height: number, raw: string): number {
		let parsed: unknown
		try {
			parsed = JSON.parse(raw)
		} catch (e) {
			throw new SerializationError(`Stored block ${height} is not valid JSON`, e)
		}
		if (typeof parsed !== "object" || parsed === null || !("txs" in parsed) || !Array.isArray(parsed.txs)) {
			throw new SerializationError(`Stored block ${height} has no transaction list`)
		}
		for (const entry of parsed.txs) {
			const tx = parseSignedTransaction(entry)
			try {
				this.deliver(tx)
			} catch (err) {
				// failed executions are part of the block; they fail the same way again
				console.warn(`[Ledger] \u{26A0}\u{FE0F} Replayed tx in block ${height} failed again:`, String(err))
			}
		}
		return parsed.txs.length
	}

	// ================================================
	// 		BLOCKS
	// ================================================

	/**
	 * Seals the open block, persists it and wakes every Commit broadcast waiting on it.
	 * Calls are serialized; each one seals exactly one block.
	 */
	produceBlock(): Promise<BlockRecord> {
		const next = this.sealing.then(() => this.seal())
		this.sealing = next.catch(() => undefined)
		return next
	}

	private async seal(): Promise<BlockRecord> {
		const block = this.openBlock
		if (this.storage) await this.persistBlock(this.storage, block)

		// nothing from here on awaits, so no delivery can land between persisting and closing
		this.openBlock = { height: block.height + 1, txs: [], results: [] }
		this.committedHeight = block.height
		this.markCommitted(block)

		const ready = this.waiters.filter((w) => w.height <= block.height)
		this.waiters = this.waiters.filter((w) => w.height > block.height)
		for (const waiter of ready) waiter.resolve()

		if (block.txs.length > 0) {
			console.log(`[Ledger] \u{2705} Sealed block ${block.height} (${block.txs.length} txs)`)
		}
		return block
	}

	/**
	 * Writes the block and the committed height. Deliveries during the writes still land
	 * in this block, so it is written again until it stops growing. A failed write leaves
	 * the block open and its waiters queued; the next produceBlock() retries it.
	 */
	private async persistBlock(storage: StorageAdapter, block: BlockRecord): Promise<void> {
		let written: number
		do {
			written = block.txs.length
			if (written > 0) await storage.put(blockKey(block.height), JSON.stringify(block))
			await storage.put(COMMITTED_HEIGHT_KEY, block.height.toString())
			await storage.persist()
		} while (block.txs.length !== written)
	}

	private markCommitted(block: BlockRecord): void {
		for (const { hash } of block.results) {
			const receipt = this.receipts.get(hash)
			if (receipt && receipt.status === "pending") this.receipts.set(hash, { ...receipt, status: "committed" })
		}
	}

	private waitForCommit(height: number): Promise<void> {
		if (this.committedHeight >= height) return Promise.resolve()
		return new Promise<void>((resolve, reject) => {
			let timer: ReturnType<typeof setTimeout> | undefined
			const waiter: CommitWaiter = {
				height,
				resolve: () => {
					if (timer) clearTimeout(timer)
					resolve()
				},
				reject: (err) => {
					if (timer) clearTimeout(timer)
					reject(err)
				},
			}
			if (this.commitTimeoutMs > 0) {
				timer = setTimeout(() => {
					this.waiters = this.waiters.filter((w) => w !== waiter)
					reject(
						new NetworkError(`Timed out after ${this.commitTimeoutMs}ms waiting for block ${height}`, undefined, false),
					)
				}, this.commitTimeoutMs)
			}
			this.waiters.push(waiter)
		})
	}

	// ================================================
	// 		QUERIES
	// ================================================

	async query(request: QueryRequest): Promise<QueryResponse> {
		return this.querySync(request)
	}

	querySync(request: QueryRequest): QueryResponse {
		const height = this.resolveHeight(request.height)
		const machine = this.registry.attach(request.address)
		switch (request.kind) {
			case "count":
				return { kind: "count", height, count: machine.count(height) }
			case "peaks":
				return { kind: "peaks", height, peaks: machine.peaks(height).map((cid) => cid.toString()) }
			case "root":
				return { kind: "root", height, root: machine.root(height).toString() }
			case "leaf":
				return { kind: "leaf", height, payload: uint8ArrayToHexString(machine.leaf(request.index, height)) }
		}
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
