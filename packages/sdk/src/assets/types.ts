/**
 * Asset transfer types
 *
 * The escrow ledger never moves value itself. It asks an AssetTransfer to
 * pull deposits into custody and push releases out of it; hosts back this
 * with whatever balance system they have (a token contract, a database
 * table, an in-memory map).
 */

/** Account identifier on the host ledger */
export type AccountId = string;

/** Fungible asset identifier (token contract, mint, coin type...) */
export type AssetId = string;

/** Sentinel asset id for the host's native currency */
export const NATIVE_ASSET: AssetId = "native";

/**
 * Custody capability consumed by the escrow ledger.
 *
 * Implementations must either move the full amount or throw; a partial
 * move is never acceptable.
 */
export interface AssetTransfer {
	/**
	 * Debit `from` and credit the ledger's custody.
	 *
	 * @throws AssetTransferError when the debit cannot happen
	 */
	pull(asset: AssetId, from: AccountId, amount: bigint): Promise<void>;

	/**
	 * Debit the ledger's custody and credit `to`.
	 *
	 * @throws AssetTransferError when the credit cannot happen
	 */
	push(asset: AssetId, to: AccountId, amount: bigint): Promise<void>;

	/**
	 * Whether `account` is the custody itself. Custody is never a valid
	 * escrow party.
	 */
	isCustody(account: AccountId): boolean;
}

/**
 * Error thrown by asset transfer implementations.
 */
export class AssetTransferError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "AssetTransferError";
	}
}
