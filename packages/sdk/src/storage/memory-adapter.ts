/**
 * In-Memory Storage Adapter
 *
 * A simple in-memory storage adapter for testing and development.
 * Data is lost when the process exits.
 */

import type { Escrow } from "../modules/htlc/types.js";
import {
	EscrowQueryOptions,
	EscrowQueryResult,
	EscrowStorage,
	StorageError,
} from "./types.js";

/**
 * @example
 * ```typescript
 * const storage = new MemoryEscrowStorage();
 * const ledger = new EscrowLedger({ storage, assets });
 * ```
 */
export class MemoryEscrowStorage implements EscrowStorage {
	private escrows: Map<string, Escrow> = new Map();

	async load(key: string): Promise<Escrow | null> {
		const escrow = this.escrows.get(key);
		// Return a copy to prevent external mutations
		return escrow ? { ...escrow } : null;
	}

	async insert(key: string, escrow: Escrow): Promise<void> {
		if (this.escrows.has(key)) {
			throw new StorageError(`Key ${key} already stored`, "DUPLICATE_KEY", {
				key,
			});
		}
		this.escrows.set(key, { ...escrow });
	}

	async update(key: string, escrow: Escrow): Promise<void> {
		if (!this.escrows.has(key)) {
			throw new StorageError(`Key ${key} not stored`, "NOT_FOUND", { key });
		}
		this.escrows.set(key, { ...escrow });
	}

	async exists(key: string): Promise<boolean> {
		return this.escrows.has(key);
	}

	async count(): Promise<number> {
		return this.escrows.size;
	}

	async query(options?: EscrowQueryOptions): Promise<EscrowQueryResult> {
		let escrows = Array.from(this.escrows.values());

		if (options?.owner !== undefined) {
			const owner = options.owner;
			escrows = escrows.filter((e) => e.owner === owner);
		}
		if (options?.taker !== undefined) {
			const taker = options.taker;
			escrows = escrows.filter((e) => e.taker === taker);
		}
		if (options?.asset !== undefined) {
			const asset = options.asset;
			escrows = escrows.filter((e) => e.asset === asset);
		}
		if (options?.status !== undefined) {
			const statuses = Array.isArray(options.status)
				? options.status
				: [options.status];
			escrows = escrows.filter((e) => statuses.includes(e.status));
		}

		const total = escrows.length;

		// Map iteration order is insertion order, which breaks createdAt ties
		const direction = options?.sortOrder === "asc" ? 1 : -1;
		const indexed = escrows.map((escrow, index) => ({ escrow, index }));
		indexed.sort(
			(a, b) =>
				direction * (a.escrow.createdAt - b.escrow.createdAt) ||
				direction * (a.index - b.index),
		);

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? total;
		const items = indexed
			.slice(offset, offset + limit)
			.map(({ escrow }) => ({ ...escrow }));

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	/**
	 * Clear all escrows from memory.
	 */
	clear(): void {
		this.escrows.clear();
	}
}
