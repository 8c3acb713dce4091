import { MerkleMountainRange, getRootFromPeaks } from "./MerkleMountainRange.ts"
import { SnapshotStore } from "./SnapshotStore.ts"
import { assertCanWrite } from "./accessControl.ts"
import { NotFoundError, SerializationError } from "../utils/errors.ts"
import type {
	AccumulatorInfo,
	AppendResult,
	ChainClock,
	Commitment,
	PeakWithHeight,
	WriteAccess,
} from "../types/types.ts"

export type AccumulatorOptions = {
	address: string
	owner: string
	writeAccess: WriteAccess
	createdAtHeight: number
	clock: ChainClock
	maxPayloadBytes: number
}

/**
 * One accumulator machine: its MMR, its write policy and its snapshot history.
 * Nothing here is shared with any other instance.
 */
export class Accumulator {
	readonly address: string
	readonly owner: string
	readonly writeAccess: WriteAccess
	readonly createdAtHeight: number

	private readonly mmr = new MerkleMountainRange()
	private readonly snapshots: SnapshotStore
	private readonly maxPayloadBytes: number

	constructor(options: AccumulatorOptions) {
		this.address = options.address
		this.owner = options.owner
		this.writeAccess = options.writeAccess
		this.createdAtHeight = options.createdAtHeight
		this.maxPayloadBytes = options.maxPayloadBytes
		this.snapshots = new SnapshotStore(options.clock, options.createdAtHeight)
	}

	/**
	 * Appends `payload` on behalf of `caller` in the block at `height`.
	 * Every check runs before the MMR is touched, so a rejected append leaves no trace.
	 */
	append(caller: string, payload: Uint8Array, height: number): AppendResult {
		if (!(payload instanceof Uint8Array)) throw new SerializationError("Payload must be bytes")
		if (payload.length > this.maxPayloadBytes) {
			throw new SerializationError(`Payload is ${payload.length} bytes; the maximum is ${this.maxPayloadBytes}`)
		}
		assertCanWrite(caller, this.writeAccess, this.owner)
		this.snapshots.assertWritable(height)

		const { leafIndex, root } = this.mmr.append(payload)
		const leafCount = this.mmr.count()
		this.snapshots.recordSnapshot(height, leafCount, this.mmr.peaksWithHeights())

		return { leafIndex, leafCount, root, height }
	}

	count(height: number): number {
		return this.snapshots.resolve(height).leafCount
	}

	peaks(height: number): Commitment[] {
		return this.snapshots.resolve(height).peaks.map((p) => p.cid)
	}

	peaksWithHeights(height: number): readonly PeakWithHeight[] {
		return this.snapshots.resolve(height).peaks
	}

	root(height: number): Commitment {
		return getRootFromPeaks(this.peaks(height))
	}

	// Leaves are immutable once stored, so only the count needs resolving by height
	leaf(index: number, height: number): Uint8Array {
		const leafCount = this.count(height)
		if (!Number.isInteger(index) || index < 0 || index >= leafCount) {
			throw new NotFoundError(`Leaf ${index} not found at height ${height} (leaf count is ${leafCount})`)
		}
		return this.mmr.leaf(index)
	}

	info(): AccumulatorInfo {
		return {
			address: this.address,
			owner: this.owner,
			writeAccess: this.writeAccess,
			createdAtHeight: this.createdAtHeight,
		}
	}

	snapshotHeights(): number[] {
		return this.snapshots.heights()
	}
}
