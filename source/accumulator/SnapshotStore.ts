import { InvalidHeightError } from "../utils/errors.ts"
import type { ChainClock, PeakWithHeight, Snapshot, SnapshotState } from "../types/types.ts"

const EMPTY_STATE: SnapshotState = Object.freeze({ leafCount: 0, peaks: Object.freeze([]) })

/**
 * Append-only log of accumulator checkpoints, one per height at which an append happened.
 * Reads resolve to the latest checkpoint at or before the requested height.
 */
export class SnapshotStore {
	private snapshots: Snapshot[] = []

	constructor(
		private readonly clock: ChainClock,
		readonly createdAtHeight: number,
	) {}

	// Only the open height is writable: earlier heights are history, later ones do not exist yet
	assertWritable(height: number): void {
		if (!Number.isInteger(height) || height < this.createdAtHeight) {
			throw new InvalidHeightError(`Cannot record at height ${height} (created at ${this.createdAtHeight})`)
		}
		const tip = this.clock.tipHeight()
		if (height !== tip) {
			throw new InvalidHeightError(`Cannot record at height ${height}: the open height is ${tip}`)
		}
		const last = this.latest()
		if (last && height < last.height) {
			throw new InvalidHeightError(`Cannot record at height ${height}: already recorded height ${last.height}`)
		}
	}

	/**
	 * Records the state after an append at `height`. A second append in the same
	 * height (same block) replaces that height's entry.
	 */
	recordSnapshot(height: number, leafCount: number, peaks: readonly PeakWithHeight[]): void {
		this.assertWritable(height)
		const last = this.latest()
		if (last && leafCount < last.leafCount) {
			throw new Error(`Snapshot leaf count went backwards: ${last.leafCount} -> ${leafCount}`)
		}
		const snapshot: Snapshot = Object.freeze({ height, leafCount, peaks: Object.freeze(peaks.slice()) })
		if (last && last.height === height) {
			this.snapshots[this.snapshots.length - 1] = snapshot
		} else {
			this.snapshots.push(snapshot)
		}
	}

	resolve(height: number): SnapshotState {
		if (!Number.isInteger(height) || height < 0) {
			throw new InvalidHeightError(`Invalid height ${height}`)
		}
		const tip = this.clock.tipHeight()
		if (height > tip) {
			throw new InvalidHeightError(`Height ${height} is beyond the current tip ${tip}`)
		}

		// binary search for the last snapshot with snapshot.height <= height
		let lo = 0
		let hi = this.snapshots.length - 1
		let found = -1
		while (lo <= hi) {
			const mid = (lo + hi) >>> 1
			if (this.snapshots[mid].height <= height) {
				found = mid
				lo = mid + 1
			} else {
				hi = mid - 1
			}
		}
		if (found === -1) return EMPTY_STATE
		const { leafCount, peaks } = this.snapshots[found]
		return { leafCount, peaks }
	}

	latest(): Snapshot | undefined {
		return this.snapshots[this.snapshots.length - 1]
	}

	heights(): number[] {
		return this.snapshots.map((s) => s.height)
	}
}
