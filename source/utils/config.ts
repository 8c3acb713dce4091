import type { AccumulatorMachineConfig, StorageBackend } from "../types/types.ts"

export const DEFAULT_CONFIG: AccumulatorMachineConfig = {
	MAX_PAYLOAD_BYTES: 1024 * 1024,
	BLOCK_INTERVAL_MS: 1000,
	COMMIT_TIMEOUT_MS: 30_000,
	STORAGE_BACKEND: "memory",
	DB_PATH: undefined,
	RPC_MAX_RETRIES: 3,
	RPC_BASE_DELAY_MS: 200,
}

const STORAGE_BACKENDS: readonly StorageBackend[] = ["memory", "sqlite", "level"]

function readNonNegativeInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
	const raw = env[key]
	if (raw === undefined || raw.trim() === "") return fallback
	const value = Number(raw)
	if (!Number.isInteger(value) || value < 0) {
		throw new Error(`Config ${key} must be a non-negative integer, got "${raw}"`)
	}
	return value
}

function isStorageBackend(value: string): value is StorageBackend {
	return (STORAGE_BACKENDS as readonly string[]).includes(value)
}

/**
 * Builds a config from environment variables (load a .env first with `import "dotenv/config"`).
 * Unset variables fall back to DEFAULT_CONFIG.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AccumulatorMachineConfig {
	const backend = (env.STORAGE_BACKEND ?? DEFAULT_CONFIG.STORAGE_BACKEND).trim().toLowerCase()
	if (!isStorageBackend(backend)) {
		throw new Error(`Config STORAGE_BACKEND must be one of ${STORAGE_BACKENDS.join(", ")}, got "${backend}"`)
	}

	const config: AccumulatorMachineConfig = {
		MAX_PAYLOAD_BYTES: readNonNegativeInt(env, "MAX_PAYLOAD_BYTES", DEFAULT_CONFIG.MAX_PAYLOAD_BYTES),
		BLOCK_INTERVAL_MS: readNonNegativeInt(env, "BLOCK_INTERVAL_MS", DEFAULT_CONFIG.BLOCK_INTERVAL_MS),
		COMMIT_TIMEOUT_MS: readNonNegativeInt(env, "COMMIT_TIMEOUT_MS", DEFAULT_CONFIG.COMMIT_TIMEOUT_MS),
		STORAGE_BACKEND: backend,
		DB_PATH: env.DB_PATH?.trim() || undefined,
		RPC_MAX_RETRIES: readNonNegativeInt(env, "RPC_MAX_RETRIES", DEFAULT_CONFIG.RPC_MAX_RETRIES),
		RPC_BASE_DELAY_MS: readNonNegativeInt(env, "RPC_BASE_DELAY_MS", DEFAULT_CONFIG.RPC_BASE_DELAY_MS),
	}

	if (config.STORAGE_BACKEND !== "memory" && config.DB_PATH === undefined) {
		throw new Error(`Config DB_PATH is required when STORAGE_BACKEND is ${config.STORAGE_BACKEND}`)
	}
	return config
}
