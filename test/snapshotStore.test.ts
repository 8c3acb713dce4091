import { describe, test, expect, beforeEach } from "vitest"
import { SnapshotStore } from "../source/accumulator/SnapshotStore.ts"
import { hashLeaf } from "../source/utils/codec.ts"
import { InvalidHeightError } from "../source/utils/errors.ts"
import type { PeakWithHeight } from "../source/types/types.ts"

const peak = (s: string, height: number): PeakWithHeight => ({ cid: hashLeaf(new TextEncoder().encode(s)), height })

describe("SnapshotStore", () => {
	let tip: number
	let store: SnapshotStore

	// records at `height` with the clock sitting on it, as the ledger does
	const recordAt = (height: number, leafCount: number, peaks: PeakWithHeight[]) => {
		tip = height
		store.recordSnapshot(height, leafCount, peaks)
	}

	beforeEach(() => {
		tip = 10
		store = new SnapshotStore({ tipHeight: () => tip }, 2)
	})

	test("resolves to the zero state before anything is recorded", () => {
		expect(store.resolve(0)).toEqual({ leafCount: 0, peaks: [] })
		expect(store.resolve(5)).toEqual({ leafCount: 0, peaks: [] })
		expect(store.latest()).toBeUndefined()
	})

	test("resolves to the latest snapshot at or before the height", () => {
		const first = [peak("a", 0)]
		const second = [peak("ab", 1)]
		recordAt(3, 1, first)
		recordAt(5, 2, second)
		tip = 10

		expect(store.resolve(2).leafCount).toBe(0)
		expect(store.resolve(3).leafCount).toBe(1)
		expect(store.resolve(4).peaks).toEqual(first)
		expect(store.resolve(5).peaks).toEqual(second)
		expect(store.resolve(10).leafCount).toBe(2)
		expect(store.heights()).toEqual([3, 5])
	})

	test("rejects heights beyond the tip, negative and fractional heights", () => {
		expect(() => store.resolve(11)).toThrow(InvalidHeightError)
		expect(() => store.resolve(11)).toThrow("Height 11 is beyond the current tip 10")
		expect(() => store.resolve(-1)).toThrow(InvalidHeightError)
		expect(() => store.resolve(1.5)).toThrow(InvalidHeightError)
		tip = 11
		expect(store.resolve(11).leafCount).toBe(0)
	})

	test("a second record at the same height replaces that height's entry", () => {
		recordAt(4, 1, [peak("a", 0)])
		recordAt(4, 2, [peak("ab", 1)])
		expect(store.heights()).toEqual([4])
		expect(store.resolve(4).leafCount).toBe(2)
	})

	test("refuses to record below creation", () => {
		tip = 1
		expect(() => store.recordSnapshot(1, 2, [])).toThrow("Cannot record at height 1 (created at 2)")
	})

	test("only the open height is writable", () => {
		recordAt(3, 1, [peak("a", 0)])
		tip = 6
		expect(() => store.recordSnapshot(5, 2, [])).toThrow("Cannot record at height 5: the open height is 6")
		expect(() => store.recordSnapshot(3, 2, [])).toThrow(InvalidHeightError)
		expect(() => store.recordSnapshot(1000, 2, [])).toThrow("Cannot record at height 1000: the open height is 6")
		expect(store.heights()).toEqual([3])
		expect(store.resolve(5).leafCount).toBe(1)
	})

	test("refuses a decreasing leaf count", () => {
		recordAt(3, 2, [peak("ab", 1)])
		expect(() => recordAt(4, 1, [])).toThrow("Snapshot leaf count went backwards: 2 -> 1")
	})

	test("recorded snapshots are isolated from the caller's array", () => {
		const peaks = [peak("a", 0)]
		recordAt(3, 1, peaks)
		peaks.push(peak("b", 0))
		expect(store.resolve(3).peaks.length).toBe(1)
	})

	test("binary search finds the right checkpoint among many", () => {
		for (let h = 2; h <= 400; h += 3) recordAt(h, h, [])
		tip = 1000
		expect(store.resolve(2).leafCount).toBe(2)
		expect(store.resolve(4).leafCount).toBe(2)
		expect(store.resolve(5).leafCount).toBe(5)
		expect(store.resolve(399).leafCount).toBe(398)
		expect(store.resolve(1000).leafCount).toBe(398)
	})
})
