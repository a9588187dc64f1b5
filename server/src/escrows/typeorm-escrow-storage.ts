/**
 * TypeORM Storage Adapter
 *
 * Implements the SDK's EscrowStorage interface on the EscrowRecord entity,
 * so the ledger persists to the application's database.
 */

import { QueryFailedError, Repository } from "typeorm";
import {
	type Escrow,
	type EscrowQueryOptions,
	type EscrowQueryResult,
	type EscrowStorage,
	StorageError,
} from "@htlc-ledger/sdk";
import { EscrowRecord } from "./escrow-record.entity";

/**
 * @example
 * ```typescript
 * const storage = new TypeOrmEscrowStorage(escrowRepository);
 * const ledger = new EscrowLedger({ storage, assets });
 * ```
 */
export class TypeOrmEscrowStorage implements EscrowStorage {
	constructor(private readonly repository: Repository<EscrowRecord>) {}

	async load(key: string): Promise<Escrow | null> {
		try {
			const entity = await this.repository.findOne({ where: { key } });
			return entity ? toEscrow(entity) : null;
		} catch (error) {
			throw new StorageError(`Failed to load escrow ${key}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async insert(key: string, escrow: Escrow): Promise<void> {
		if (await this.exists(key)) {
			throw new StorageError(`Key ${key} already stored`, "DUPLICATE_KEY", {
				key,
			});
		}
		try {
			await this.repository.insert({ key, ...toColumns(escrow) });
		} catch (error) {
			if (
				error instanceof QueryFailedError &&
				error.message.includes("UNIQUE constraint failed")
			) {
				throw new StorageError(`Key ${key} already stored`, "DUPLICATE_KEY", {
					key,
				});
			}
			throw new StorageError(`Failed to insert escrow ${key}`, "SAVE_ERROR", {
				error,
			});
		}
	}

	async update(key: string, escrow: Escrow): Promise<void> {
		if (!(await this.exists(key))) {
			throw new StorageError(`Key ${key} not stored`, "NOT_FOUND", { key });
		}
		try {
			await this.repository.update({ key }, toColumns(escrow));
		} catch (error) {
			throw new StorageError(`Failed to update escrow ${key}`, "SAVE_ERROR", {
				error,
			});
		}
	}

	async exists(key: string): Promise<boolean> {
		try {
			const count = await this.repository.count({ where: { key } });
			return count > 0;
		} catch (error) {
			throw new StorageError(
				`Failed to check existence of escrow ${key}`,
				"EXISTS_ERROR",
				{ error },
			);
		}
	}

	async count(): Promise<number> {
		return this.repository.count();
	}

	async query(options?: EscrowQueryOptions): Promise<EscrowQueryResult> {
		try {
			const qb = this.repository.createQueryBuilder("e");

			if (options?.owner !== undefined) {
				qb.andWhere("e.owner = :owner", { owner: options.owner });
			}
			if (options?.taker !== undefined) {
				qb.andWhere("e.taker = :taker", { taker: options.taker });
			}
			if (options?.asset !== undefined) {
				qb.andWhere("e.asset = :asset", { asset: options.asset });
			}
			if (options?.status !== undefined) {
				const statuses = Array.isArray(options.status)
					? options.status
					: [options.status];
				qb.andWhere("e.status IN (:...statuses)", { statuses });
			}

			// Row id breaks createdAt ties, matching insertion order
			const direction = options?.sortOrder === "asc" ? "ASC" : "DESC";
			qb.orderBy("e.createdAt", direction).addOrderBy("e.id", direction);

			const offset = options?.offset ?? 0;
			qb.skip(offset);
			if (options?.limit !== undefined) {
				qb.take(options.limit);
			}

			const [entities, total] = await qb.getManyAndCount();
			return {
				items: entities.map(toEscrow),
				total,
				hasMore: offset + entities.length < total,
			};
		} catch (error) {
			throw new StorageError("Failed to query escrows", "QUERY_ERROR", {
				error,
			});
		}
	}
}

function toColumns(escrow: Escrow): Omit<EscrowRecord, "id" | "key" | "insertedAt" | "updatedAt"> {
	return {
		orderId: escrow.orderId,
		owner: escrow.owner,
		taker: escrow.taker,
		asset: escrow.asset,
		secretHash: escrow.secretHash,
		amount: escrow.amount,
		timelock: escrow.timelock,
		status: escrow.status,
		createdAt: escrow.createdAt,
		// null clears the column when a failed release restores the record
		completedAt: escrow.completedAt ?? null,
		cancelledAt: escrow.cancelledAt ?? null,
	};
}

function toEscrow(entity: EscrowRecord): Escrow {
	const escrow: Escrow = {
		orderId: entity.orderId,
		secretHash: entity.secretHash,
		owner: entity.owner,
		taker: entity.taker,
		asset: entity.asset,
		amount: entity.amount,
		timelock: entity.timelock,
		status: entity.status,
		createdAt: entity.createdAt,
	};
	if (entity.completedAt != null) escrow.completedAt = entity.completedAt;
	if (entity.cancelledAt != null) escrow.cancelledAt = entity.cancelledAt;
	return escrow;
}
