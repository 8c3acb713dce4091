import { describe, test, expect } from "vitest"
import { getCreateAddress } from "ethers"
import { MachineRegistry } from "../source/registry/MachineRegistry.ts"
import { NotFoundError, SerializationError } from "../source/utils/errors.ts"

const OWNER = "0x1111111111111111111111111111111111111111"
const OTHER = "0x2222222222222222222222222222222222222222"
const bytes = (s: string) => new TextEncoder().encode(s)

describe("MachineRegistry", () => {
	const clock = { tipHeight: () => 3 }

	test("derives addresses from the creator and a per-creator nonce", () => {
		const registry = new MachineRegistry({ clock })
		const first = registry.create("OnlyOwner", OWNER)
		const second = registry.create("Public", OWNER)
		const third = registry.create("OnlyOwner", OTHER)

		expect(first).toBe(getCreateAddress({ from: OWNER, nonce: 0 }))
		expect(second).toBe(getCreateAddress({ from: OWNER, nonce: 1 }))
		expect(third).toBe(getCreateAddress({ from: OTHER, nonce: 0 }))
		expect(new Set([first, second, third]).size).toBe(3)
		expect(registry.addresses()).toEqual([first, second, third])
	})

	test("new accumulators are empty, record their policy and default to the tip height", () => {
		const registry = new MachineRegistry({ clock })
		const address = registry.create("Public", OWNER)
		const acc = registry.attach(address)
		expect(acc.info()).toEqual({ address, owner: OWNER, writeAccess: "Public", createdAtHeight: 3 })
		expect(acc.count(3)).toBe(0)
	})

	test("attach resolves regardless of address casing and fails for unknown addresses", () => {
		const registry = new MachineRegistry({ clock })
		const address = registry.create("OnlyOwner", OWNER)
		expect(registry.attach(address.toLowerCase()).address).toBe(address)
		expect(registry.has(address.toLowerCase())).toBe(true)
		expect(() => registry.attach(OTHER)).toThrow(NotFoundError)
		expect(() => registry.attach("garbage")).toThrow(NotFoundError)
		expect(registry.has("garbage")).toBe(false)
	})

	test("instances share no state", () => {
		const registry = new MachineRegistry({ clock })
		const one = registry.attach(registry.create("OnlyOwner", OWNER))
		const two = registry.attach(registry.create("OnlyOwner", OWNER))
		one.append(OWNER, bytes("a"), 3)
		one.append(OWNER, bytes("b"), 3)
		two.append(OWNER, bytes("z"), 3)
		expect(one.count(3)).toBe(2)
		expect(two.count(3)).toBe(1)
		expect(one.root(3).toString()).not.toBe(two.root(3).toString())
	})

	test("the configured payload limit reaches every accumulator", () => {
		const registry = new MachineRegistry({ clock, maxPayloadBytes: 2 })
		const acc = registry.attach(registry.create("Public", OWNER))
		expect(() => acc.append(OTHER, bytes("abc"), 3)).toThrow(SerializationError)
	})

	test("rejects a malformed owner identity", () => {
		const registry = new MachineRegistry({ clock })
		expect(() => registry.create("OnlyOwner", "nobody")).toThrow(SerializationError)
		expect(registry.addresses()).toEqual([])
	})
})
