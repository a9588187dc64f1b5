/**
 * Storage Adapter Types
 *
 * Defines the interface for pluggable escrow persistence. Hosts bring their
 * own backend (SQLite, Postgres, a contract's key-value store...) by
 * implementing EscrowStorage.
 */

import type { AccountId, AssetId } from "../assets/types.js";
import type { Escrow, EscrowStatus } from "../modules/htlc/types.js";

/**
 * Query options for listing escrows.
 */
export interface EscrowQueryOptions {
	/** Filter by owner */
	owner?: AccountId;
	/** Filter by taker */
	taker?: AccountId;
	/** Filter by status(es) */
	status?: EscrowStatus | EscrowStatus[];
	/** Filter by asset */
	asset?: AssetId;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort by creation time, newest first by default */
	sortOrder?: "asc" | "desc";
}

/**
 * Query result with pagination info.
 */
export interface EscrowQueryResult {
	/** The items matching the query */
	items: Escrow[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Storage adapter interface.
 *
 * Keys are the digests produced by `deriveEscrowKey`. Records are never
 * deleted, so there is no delete operation.
 *
 * @example
 * ```typescript
 * class PostgresEscrowStorage implements EscrowStorage {
 *   constructor(private pool: Pool) {}
 *
 *   async insert(key: string, escrow: Escrow): Promise<void> {
 *     await this.pool.query(
 *       "INSERT INTO escrows (key, data) VALUES ($1, $2)",
 *       [key, serialize(escrow)],
 *     );
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface EscrowStorage {
	/**
	 * Load an escrow.
	 *
	 * @returns The escrow if found, null otherwise
	 */
	load(key: string): Promise<Escrow | null>;

	/**
	 * Insert a new escrow.
	 *
	 * @throws StorageError with code DUPLICATE_KEY if the key is taken
	 */
	insert(key: string, escrow: Escrow): Promise<void>;

	/**
	 * Replace an existing escrow.
	 *
	 * @throws StorageError with code NOT_FOUND if the key is absent
	 */
	update(key: string, escrow: Escrow): Promise<void>;

	/**
	 * Check if an escrow exists.
	 */
	exists(key: string): Promise<boolean>;

	/**
	 * Number of escrows ever stored.
	 */
	count(): Promise<number>;

	/**
	 * List escrows with pagination info.
	 */
	query(options?: EscrowQueryOptions): Promise<EscrowQueryResult>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
