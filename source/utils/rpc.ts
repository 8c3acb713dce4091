// utils/rpc.ts
import { isRetryable } from "./errors.ts"

/**
 * Calls `fn`, retrying transport failures with exponential backoff plus up to 1s of jitter.
 * Anything other than a NetworkError is terminal and rethrown immediately.
 * @param maxRetries retries after the first attempt
 * @param baseDelayMs delay before the first retry; doubles on each further retry
 */
export async function retryRpcCall<T>(fn: () => Promise<T>, maxRetries = 3, baseDelayMs = 200): Promise<T> {
	let attempt = 0
	while (true) {
		try {
			return await fn()
		} catch (err) {
			if (!isRetryable(err) || attempt >= maxRetries) throw err
			const delay = baseDelayMs * 2 ** attempt + Math.floor(Math.random() * 1000)
			console.warn(`[RPC] \u{1F501} Attempt ${attempt + 1} failed (${String(err)}); retrying in ${delay}ms`)
			await new Promise((resolve) => setTimeout(resolve, delay))
			attempt++
		}
	}
}
