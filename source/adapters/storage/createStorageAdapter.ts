import type { StorageAdapter } from "../../interfaces/StorageAdapter.ts"
import type { AccumulatorMachineConfig } from "../../types/types.ts"
import { MemoryAdapter } from "./MemoryAdapter.ts"

// Node-only backends are imported lazily so the memory path pulls in no native modules
export async function createStorageAdapter(
	config: Pick<AccumulatorMachineConfig, "STORAGE_BACKEND" | "DB_PATH">,
): Promise<StorageAdapter> {
	switch (config.STORAGE_BACKEND) {
		case "memory":
			return new MemoryAdapter()
		case "sqlite": {
			const { SqliteAdapter } = await import("./SqliteAdapter.ts")
			return new SqliteAdapter(config.DB_PATH ?? "./accumulator-machine.sqlite")
		}
		case "level": {
			const { LevelDbAdapter } = await import("./LevelDbAdapter.ts")
			return new LevelDbAdapter(config.DB_PATH ?? "./accumulator-machine.leveldb")
		}
	}
}
