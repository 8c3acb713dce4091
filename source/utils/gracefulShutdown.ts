import type { Ledger } from "../ledger/Ledger.ts"

export function registerGracefulShutdown(ledger: Ledger) {
	let shuttingDown = false
	process.on("SIGINT", async () => {
		if (shuttingDown) return
		shuttingDown = true
		console.log("\nCaught SIGINT (Ctrl+C). Shutting down gracefully...")
		try {
			await ledger.close()
			console.log("Graceful shutdown complete. Exiting.")
		} catch (err) {
			console.error("Error during shutdown:", err)
		} finally {
			process.exit(0)
		}
	})
}
