import { Wallet } from "ethers"
import { serializeTxBody } from "../ledger/transactions.ts"
import { SigningError } from "../utils/errors.ts"
import { retryRpcCall } from "../utils/rpc.ts"
import type { LedgerTransport, SignedTransaction, TxBody } from "../types/types.ts"

// Body fields the signer fills in itself
type UnsignedBody<T extends TxBody = TxBody> = T extends TxBody ? Omit<T, "from" | "sequence"> : never

/**
 * Wraps an ethers Wallet (secp256k1, Ethereum account) and tracks the sequence
 * number the next transaction must carry.
 */
export class TransactionSigner {
	readonly wallet: Wallet
	private sequence?: number

	constructor(privateKeyOrWallet: string | Wallet) {
		if (typeof privateKeyOrWallet !== "string") {
			this.wallet = privateKeyOrWallet
			return
		}
		try {
			this.wallet = new Wallet(privateKeyOrWallet)
		} catch (e) {
			throw new SigningError("Invalid private key", e)
		}
	}

	get address(): string {
		return this.wallet.address
	}

	/**
	 * Uses `sequence` when given, otherwise asks the ledger for the account's next one.
	 */
	async setSequence(sequence: number | undefined, transport: LedgerTransport, maxRetries?: number): Promise<void> {
		this.sequence = sequence ?? (await retryRpcCall(() => transport.getSequence(this.address), maxRetries))
	}

	async sign(body: UnsignedBody): Promise<SignedTransaction> {
		if (this.sequence === undefined) throw new SigningError("Sequence not set. Call setSequence() first.")
		const full: TxBody = { ...body, from: this.address, sequence: this.sequence }
		let signature: string
		try {
			signature = await this.wallet.signMessage(serializeTxBody(full))
		} catch (e) {
			throw new SigningError("Failed to sign transaction", e)
		}
		this.sequence++
		return { body: full, signature }
	}

	// Re-sync after a rejected transaction left the local sequence ahead of the ledger
	async resync(transport: LedgerTransport): Promise<void> {
		await this.setSequence(undefined, transport)
	}
}
