/**
 * Storage module - Pluggable persistence adapters
 *
 * This module defines the storage interface and provides a reference
 * implementation. Hosts bring their own persistence layer by implementing
 * EscrowStorage.
 */

export type {
	EscrowQueryOptions,
	EscrowQueryResult,
	EscrowStorage,
} from "./types.js";

export { StorageError } from "./types.js";

export { MemoryEscrowStorage } from "./memory-adapter.js";
