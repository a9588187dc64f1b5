import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, Repository } from "typeorm";
import {
	type AccountId,
	type AssetId,
	type AssetTransfer,
	AssetTransferError,
	CUSTODY_ACCOUNT,
} from "@htlc-ledger/sdk";
import { AssetBalance } from "./asset-balance.entity";
import { TransactionRunner } from "../common/transaction-runner";

/**
 * Database-backed fungible balances. Also the escrow custody: deposits are
 * moved to CUSTODY_ACCOUNT and released from it.
 *
 * `pull` and `push` do not open a transaction of their own; callers run
 * them inside `TransactionRunner.run`, as the escrow ledger does.
 */
@Injectable()
export class AssetsService implements AssetTransfer {
	private readonly logger = new Logger(AssetsService.name);

	constructor(
		@InjectRepository(AssetBalance)
		private readonly balanceRepository: Repository<AssetBalance>,
		private readonly transactions: TransactionRunner,
	) {}

	async balanceOf(asset: AssetId, account: AccountId): Promise<bigint> {
		const row = await this.balanceRepository.findOne({
			where: { asset, account },
		});
		return row?.amount ?? 0n;
	}

	async custodyBalance(asset: AssetId): Promise<bigint> {
		return this.balanceOf(asset, CUSTODY_ACCOUNT);
	}

	isCustody(account: AccountId): boolean {
		return account === CUSTODY_ACCOUNT;
	}

	/**
	 * Issue new units to `account`.
	 *
	 * @returns the account's balance after minting
	 */
	async mint(asset: AssetId, account: AccountId, amount: bigint): Promise<bigint> {
		assertPositive(amount);
		this.assertNotCustody(account);
		const balance = await this.transactions.run(() =>
			this.balanceRepository.manager.transaction((manager) =>
				this.adjust(manager, asset, account, amount),
			),
		);
		this.logger.log(`Minted ${amount} ${asset} to ${account}`);
		return balance;
	}

	/**
	 * Move units between two accounts outside custody.
	 */
	async transfer(
		asset: AssetId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): Promise<void> {
		this.assertNotCustody(from);
		this.assertNotCustody(to);
		await this.transactions.run(() => this.move(asset, from, to, amount));
	}

	async pull(asset: AssetId, from: AccountId, amount: bigint): Promise<void> {
		this.assertNotCustody(from);
		await this.move(asset, from, CUSTODY_ACCOUNT, amount);
	}

	async push(asset: AssetId, to: AccountId, amount: bigint): Promise<void> {
		this.assertNotCustody(to);
		await this.move(asset, CUSTODY_ACCOUNT, to, amount);
	}

	private async move(
		asset: AssetId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): Promise<void> {
		assertPositive(amount);
		const available = await this.balanceOf(asset, from);
		if (available < amount) {
			throw new AssetTransferError(
				`Insufficient balance: ${from} holds ${available} of ${asset}, needs ${amount}`,
				"INSUFFICIENT_BALANCE",
				{ asset, account: from, available: available.toString() },
			);
		}
		await this.balanceRepository.manager.transaction(async (manager) => {
			await this.adjust(manager, asset, from, -amount);
			await this.adjust(manager, asset, to, amount);
		});
	}

	private assertNotCustody(account: AccountId): void {
		if (this.isCustody(account)) {
			throw new AssetTransferError(
				`Account ${account} is the escrow custody`,
				"CUSTODY_ACCOUNT",
				{ account },
			);
		}
	}

	private async adjust(
		manager: EntityManager,
		asset: AssetId,
		account: AccountId,
		delta: bigint,
	): Promise<bigint> {
		const row =
			(await manager.findOne(AssetBalance, { where: { asset, account } })) ??
			manager.create(AssetBalance, { asset, account, amount: 0n });
		row.amount += delta;
		await manager.save(row);
		return row.amount;
	}
}

function assertPositive(amount: bigint): void {
	if (amount <= 0n) {
		throw new AssetTransferError(
			`Amount must be positive, got ${amount}`,
			"INVALID_AMOUNT",
		);
	}
}
