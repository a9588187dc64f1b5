import { Injectable } from "@nestjs/common";
import { DataSource } from "typeorm";
import { KeyedMutex } from "@htlc-ledger/sdk";

const CONNECTION_LOCK = "connection";

/**
 * Runs database work in one transaction at a time.
 *
 * The better-sqlite3 driver hands every repository the same query runner,
 * so repository calls made inside `run` join its transaction and nested
 * `manager.transaction` calls become savepoints. Two transactions on that
 * runner must never interleave, hence the lock.
 */
@Injectable()
export class TransactionRunner {
	private readonly mutex = new KeyedMutex();

	constructor(private readonly dataSource: DataSource) {}

	async run<T>(work: () => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(CONNECTION_LOCK, () =>
			this.dataSource.transaction(() => work()),
		);
	}
}
