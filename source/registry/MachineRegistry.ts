import { getCreateAddress } from "ethers"
import { Accumulator } from "../accumulator/Accumulator.ts"
import { normalizeIdentity } from "../accumulator/accessControl.ts"
import { NotFoundError } from "../utils/errors.ts"
import { DEFAULT_CONFIG } from "../utils/config.ts"
import type { ChainClock, WriteAccess } from "../types/types.ts"

export type MachineRegistryOptions = {
	clock: ChainClock
	maxPayloadBytes?: number
}

/**
 * Arena of accumulator machines keyed by address.
 * Addresses are derived like contract addresses: creator plus a per-creator nonce.
 */
export class MachineRegistry {
	private readonly machines = new Map<string, Accumulator>()
	private readonly createNonces = new Map<string, number>()
	private readonly clock: ChainClock
	private readonly maxPayloadBytes: number

	constructor(options: MachineRegistryOptions) {
		this.clock = options.clock
		this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_CONFIG.MAX_PAYLOAD_BYTES
	}

	create(writeAccess: WriteAccess, owner: string, height: number = this.clock.tipHeight()): string {
		const creator = normalizeIdentity(owner)
		let nonce = this.createNonces.get(creator) ?? 0
		let address = getCreateAddress({ from: creator, nonce })
		// never reuse an address, even on the (practically impossible) collision
		while (this.machines.has(address)) {
			nonce++
			address = getCreateAddress({ from: creator, nonce })
		}
		this.createNonces.set(creator, nonce + 1)

		this.machines.set(
			address,
			new Accumulator({
				address,
				owner: creator,
				writeAccess,
				createdAtHeight: height,
				clock: this.clock,
				maxPayloadBytes: this.maxPayloadBytes,
			}),
		)
		return address
	}

	attach(address: string): Accumulator {
		const machine = this.machines.get(this.key(address))
		if (!machine) throw new NotFoundError(`No accumulator at address ${address}`)
		return machine
	}

	has(address: string): boolean {
		return this.machines.has(this.key(address))
	}

	addresses(): string[] {
		return [...this.machines.keys()]
	}

	private key(address: string): string {
		try {
			return normalizeIdentity(address)
		} catch {
			// malformed addresses simply do not resolve
			return address
		}
	}
}
