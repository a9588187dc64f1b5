/**
 * Assets module - Custody capability consumed by the escrow ledger
 */

export type { AccountId, AssetId, AssetTransfer } from "./types.js";

export { NATIVE_ASSET, AssetTransferError } from "./types.js";

export {
	InMemoryAssetLedger,
	CUSTODY_ACCOUNT,
} from "./memory-asset-ledger.js";
