import type { StorageAdapter } from "../../interfaces/StorageAdapter.ts"
import Database from "better-sqlite3"
import fs from "fs"
import path from "path"

/**
 * SqliteAdapter implements StorageAdapter for Node.js using better-sqlite3.
 * Stores key-value pairs in a single table.
 */
export class SqliteAdapter implements StorageAdapter {
	private db?: Database.Database

	constructor(private readonly dbPath: string = ":memory:") {}

	async open(): Promise<void> {
		if (this.db) return
		if (this.dbPath !== ":memory:") fs.mkdirSync(path.dirname(this.dbPath), { recursive: true })
		const db = new Database(this.dbPath)
		if (this.dbPath !== ":memory:") db.pragma("journal_mode = WAL")
		db.exec(`CREATE TABLE IF NOT EXISTS kv (
			key TEXT PRIMARY KEY,
			value TEXT NOT NULL
		);`)
		this.db = db
	}

	async put(key: string, value: string): Promise<void> {
		this.connection().prepare("INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)").run(key, value)
	}

	async get(key: string): Promise<string | undefined> {
		const row = this.connection().prepare<[string], { value: string }>("SELECT value FROM kv WHERE key = ?").get(key)
		return row?.value
	}

	async delete(key: string): Promise<void> {
		this.connection().prepare("DELETE FROM kv WHERE key = ?").run(key)
	}

	async *iterate(prefix: string): AsyncIterable<{ key: string; value: string }> {
		// substr instead of LIKE so "_" and "%" in prefixes match literally
		const stmt = this.connection().prepare<[string, string], { key: string; value: string }>(
			"SELECT key, value FROM kv WHERE substr(key, 1, length(?)) = ? ORDER BY key",
		)
		for (const row of stmt.iterate(prefix, prefix)) {
			yield { key: row.key, value: row.value }
		}
	}

	async persist(): Promise<void> {
		// better-sqlite3 writes through; checkpoint the WAL so the main file is current
		if (this.db && this.dbPath !== ":memory:") this.db.pragma("wal_checkpoint(TRUNCATE)")
	}

	async close(): Promise<void> {
		this.db?.close()
		this.db = undefined
	}

	private connection(): Database.Database {
		if (!this.db) throw new Error("SqliteAdapter is not open. Call open() first.")
		return this.db
	}
}
