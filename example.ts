import "dotenv/config"
import { Wallet } from "ethers"
import { Ledger } from "./source/ledger/Ledger.ts"
import { AccumulatorClient } from "./source/client/AccumulatorClient.ts"
import { TransactionSigner } from "./source/client/TransactionSigner.ts"
import { createStorageAdapter } from "./source/adapters/storage/createStorageAdapter.ts"
import { loadConfigFromEnv } from "./source/utils/config.ts"
import { parseBroadcastMode } from "./source/utils/parse.ts"
import { registerGracefulShutdown } from "./source/utils/gracefulShutdown.ts"

async function main() {
	const config = loadConfigFromEnv()
	const storage = await createStorageAdapter(config)
	const ledger = Ledger.fromConfig(config, storage)
	await ledger.open()
	ledger.start()
	registerGracefulShutdown(ledger)

	// PRIVATE_KEY is optional; a throwaway key is fine for a local ledger
	const signer = new TransactionSigner(process.env.PRIVATE_KEY || Wallet.createRandom().privateKey)
	await signer.setSequence(undefined, ledger)

	// with BLOCK_INTERVAL_MS=0 nothing seals blocks until produceBlock(), so Commit would only time out
	const autoBlocks = config.BLOCK_INTERVAL_MS > 0
	const requested = parseBroadcastMode(process.env.BROADCAST_MODE)
	const mode = !autoBlocks && requested === "Commit" ? "Sync" : requested

	const { client } = await AccumulatorClient.create(ledger, signer, "OnlyOwner", {
		broadcastMode: autoBlocks ? "Commit" : "Sync",
		maxRetries: config.RPC_MAX_RETRIES,
		baseDelayMs: config.RPC_BASE_DELAY_MS,
	})

	for (const word of ["a", "b", "c"]) {
		const receipt = await client.push(signer, new TextEncoder().encode(word), mode)
		console.log(`[Accumulator] \u{1F4E5} Pushed "${word}":`, JSON.stringify(receipt))
	}
	// Async pushes are delivered on a later tick
	await new Promise((resolve) => setImmediate(resolve))
	await ledger.produceBlock()

	console.log(`[Accumulator] \u{1F522} Count: ${await client.count()}`)
	console.log(`[Accumulator] \u{26F0}\u{FE0F} Peaks: ${(await client.peaks()).map((p) => p.toString()).join(", ")}`)
	console.log(`[Accumulator] \u{1F333} Root: ${(await client.root()).toString()}`)
	console.log(`[Accumulator] \u{1F343} Leaf 1: ${new TextDecoder().decode(await client.leaf(1))}`)

	await ledger.close()
}

await main().catch((e) => {
	console.error("\u{274C} Example runner error:", e)
	process.exit(1)
})
