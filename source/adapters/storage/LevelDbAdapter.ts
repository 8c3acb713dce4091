import { Level } from "level"
import type { StorageAdapter } from "../../interfaces/StorageAdapter.ts"

/**
 * Basic LevelDbAdapter: stores and retrieves string values only.
 */
export class LevelDbAdapter implements StorageAdapter {
	private db: Level<string, string>

	constructor(location: string) {
		this.db = new Level<string, string>(location, { valueEncoding: "utf8" })
	}

	async delete(key: string): Promise<void> {
		await this.db.del(key)
	}

	async *iterate(prefix: string): AsyncIterable<{ key: string; value: string }> {
		// keys sort lexicographically, so a prefix scan is a range scan
		for await (const [key, value] of this.db.iterator({ gte: prefix, lt: prefix + "\uffff" })) {
			yield { key, value }
		}
	}

	async put(key: string, value: string): Promise<void> {
		await this.db.put(key, value)
	}

	async get(key: string): Promise<string | undefined> {
		try {
			return await this.db.get(key)
		} catch (err) {
			if (isNotFound(err)) return undefined
			throw err
		}
	}

	async open(): Promise<void> {
		await this.db.open()
	}

	async persist(): Promise<void> {
		// LevelDB persists automatically; no-op for interface compliance
		return
	}

	async close(): Promise<void> {
		await this.db.close()
	}
}

function isNotFound(err: unknown): boolean {
	return typeof err === "object" && err !== null && "code" in err && err.code === "LEVEL_NOT_FOUND"
}
