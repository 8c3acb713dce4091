import { hashNode, hashLeaf, EMPTY_ROOT } from "../utils/codec.ts"
import { NotFoundError } from "../utils/errors.ts"
import type { Commitment, MMRAppendResult, PeakWithHeight } from "../types/types.ts"

export class MerkleMountainRange {
	// highest mountain first; replaced wholesale on every append, never mutated in place
	private _peaks: readonly PeakWithHeight[] = []
	private leaves: Uint8Array[] = []

	/**
	 * Adds a new leaf and merges equal-height peaks until none remain adjacent.
	 * The new peak list is built on a copy and installed only once complete.
	 */
	append(payload: Uint8Array): MMRAppendResult {
		const leafIndex = this.leaves.length
		const peaks = this._peaks.slice()
		let carry: PeakWithHeight = { cid: hashLeaf(payload), height: 0 }

		while (peaks.length > 0 && peaks[peaks.length - 1].height === carry.height) {
			const left = peaks.pop()
			if (!left) throw new Error("MMR structure error: no peak to merge")
			carry = { cid: hashNode(left.cid, carry.cid), height: carry.height + 1 }
		}
		peaks.push(carry)

		this.leaves.push(payload.slice())
		this._peaks = Object.freeze(peaks)

		return { leafIndex, root: getRootFromPeaks(this.peaks()) }
	}

	count(): number {
		return this.leaves.length
	}

	peaks(): Commitment[] {
		return this._peaks.map((p) => p.cid)
	}

	peaksWithHeights(): readonly PeakWithHeight[] {
		return this._peaks
	}

	root(): Commitment {
		return getRootFromPeaks(this.peaks())
	}

	leaf(index: number): Uint8Array {
		if (!Number.isInteger(index) || index < 0 || index >= this.leaves.length) {
			throw new NotFoundError(`Leaf ${index} not found (leaf count is ${this.leaves.length})`)
		}
		return this.leaves[index].slice()
	}
}

/**
 * Computes the root CID from an array of peak CIDs, left-to-right bagging.
 * @param peaks Array of CIDs, highest mountain first
 * @returns The root CID (or the empty root if peaks is empty)
 */
export function getRootFromPeaks(peaks: readonly Commitment[]): Commitment {
	if (peaks.length === 0) return EMPTY_ROOT
	let current = peaks[0]
	for (let i = 1; i < peaks.length; i++) current = hashNode(current, peaks[i])
	return current
}
