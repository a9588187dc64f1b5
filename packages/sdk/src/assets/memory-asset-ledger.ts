/**
 * In-Memory Asset Ledger
 *
 * A mintable fungible balance ledger that also acts as the escrow's custody.
 * Useful for unit tests, simulations and demos; balances are lost when the
 * process exits.
 */

import {
	AccountId,
	AssetId,
	AssetTransfer,
	AssetTransferError,
} from "./types.js";

/** Account that holds escrowed funds */
export const CUSTODY_ACCOUNT: AccountId = "escrow-custody";

/**
 * @example
 * ```typescript
 * const assets = new InMemoryAssetLedger();
 * assets.mint("usdc", "alice", 1_000n);
 * await assets.pull("usdc", "alice", 100n);
 * assets.balanceOf("usdc", "alice"); // 900n
 * assets.custodyBalance("usdc"); // 100n
 * ```
 */
export class InMemoryAssetLedger implements AssetTransfer {
	private balances: Map<AssetId, Map<AccountId, bigint>> = new Map();

	constructor(private readonly custody: AccountId = CUSTODY_ACCOUNT) {}

	/**
	 * Credit `to` with freshly issued units. Anyone may mint.
	 */
	mint(asset: AssetId, to: AccountId, amount: bigint): void {
		assertPositive(amount);
		this.assertNotCustody(to);
		this.credit(asset, to, amount);
	}

	balanceOf(asset: AssetId, account: AccountId): bigint {
		return this.balances.get(asset)?.get(account) ?? 0n;
	}

	custodyBalance(asset: AssetId): bigint {
		return this.balanceOf(asset, this.custody);
	}

	isCustody(account: AccountId): boolean {
		return account === this.custody;
	}

	/**
	 * Move units between two accounts. Custody can only be reached through
	 * `pull` and `push`.
	 */
	async transfer(
		asset: AssetId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): Promise<void> {
		this.assertNotCustody(from);
		this.assertNotCustody(to);
		this.move(asset, from, to, amount);
	}

	async pull(asset: AssetId, from: AccountId, amount: bigint): Promise<void> {
		this.assertNotCustody(from);
		this.move(asset, from, this.custody, amount);
	}

	async push(asset: AssetId, to: AccountId, amount: bigint): Promise<void> {
		this.assertNotCustody(to);
		this.move(asset, this.custody, to, amount);
	}

	private move(
		asset: AssetId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): void {
		assertPositive(amount);
		const available = this.balanceOf(asset, from);
		if (available < amount) {
			throw new AssetTransferError(
				`Insufficient balance: ${from} holds ${available} of ${asset}, needs ${amount}`,
				"INSUFFICIENT_BALANCE",
				{ asset, account: from, available: available.toString() },
			);
		}
		this.debit(asset, from, amount);
		this.credit(asset, to, amount);
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

	private credit(asset: AssetId, account: AccountId, amount: bigint): void {
		let accounts = this.balances.get(asset);
		if (!accounts) {
			accounts = new Map();
			this.balances.set(asset, accounts);
		}
		accounts.set(account, (accounts.get(account) ?? 0n) + amount);
	}

	private debit(asset: AssetId, account: AccountId, amount: bigint): void {
		const accounts = this.balances.get(asset);
		accounts?.set(account, this.balanceOf(asset, account) - amount);
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
