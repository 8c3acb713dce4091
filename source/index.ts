export { encodeBlock, hashLeaf, hashNode, EMPTY_ROOT, commitmentFromString } from "./utils/codec.ts"
export { MerkleMountainRange, getRootFromPeaks } from "./accumulator/MerkleMountainRange.ts"
export { SnapshotStore } from "./accumulator/SnapshotStore.ts"
export { canWrite, assertCanWrite, parseWriteAccess } from "./accumulator/accessControl.ts"
export { Accumulator } from "./accumulator/Accumulator.ts"
export { MachineRegistry } from "./registry/MachineRegistry.ts"
export { Ledger } from "./ledger/Ledger.ts"
export { AccumulatorClient } from "./client/AccumulatorClient.ts"
export { TransactionSigner } from "./client/TransactionSigner.ts"
export { MemoryAdapter } from "./adapters/storage/MemoryAdapter.ts"
export { createStorageAdapter } from "./adapters/storage/createStorageAdapter.ts"
export { loadConfigFromEnv, DEFAULT_CONFIG } from "./utils/config.ts"
export { parseQueryHeight, parseBroadcastMode } from "./utils/parse.ts"
export { retryRpcCall } from "./utils/rpc.ts"
export * from "./utils/errors.ts"
export type * from "./types/types.ts"
export type { StorageAdapter } from "./interfaces/StorageAdapter.ts"
