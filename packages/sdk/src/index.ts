/**
 * HTLC Ledger SDK
 *
 * Platform-agnostic hash time-locked escrow. Hosts plug in their own
 * storage, custody and clock.
 *
 * @example
 * ```typescript
 * import {
 *   EscrowLedger,
 *   InMemoryAssetLedger,
 *   MemoryEscrowStorage,
 *   hashSecret,
 *   stringToBytes,
 * } from "@htlc-ledger/sdk";
 *
 * const assets = new InMemoryAssetLedger();
 * assets.mint("usdc", "alice", 1_000n);
 *
 * const ledger = new EscrowLedger({
 *   storage: new MemoryEscrowStorage(),
 *   assets,
 * });
 *
 * await ledger.createEscrow({
 *   orderId: "order-1",
 *   secretHash: hashSecret(stringToBytes("s3cr3t")),
 *   owner: "alice",
 *   taker: "bob",
 *   asset: "usdc",
 *   amount: 100n,
 *   timelockDuration: 3600,
 * });
 *
 * await ledger.revealSecret("order-1", "alice", stringToBytes("s3cr3t"), "bob");
 * ```
 */

// Core - Hashlock primitives and time sources
export {
	type Clock,
	DIGEST_LENGTH,
	ZERO_DIGEST,
	sha256Hex,
	hashSecret,
	parseDigest,
	isZeroDigest,
	verifySecret,
	deriveEscrowKey,
	systemClock,
	ManualClock,
} from "./core/index.js";

// Lifecycle - Status transition tables
export {
	type LifecycleDefinition,
	type LifecycleState,
	Lifecycle,
	LedgerError,
} from "./lifecycle/index.js";

// Assets - Custody capability
export {
	type AccountId,
	type AssetId,
	type AssetTransfer,
	NATIVE_ASSET,
	AssetTransferError,
	InMemoryAssetLedger,
	CUSTODY_ACCOUNT,
} from "./assets/index.js";

// Storage - Pluggable persistence
export {
	type EscrowQueryOptions,
	type EscrowQueryResult,
	type EscrowStorage,
	StorageError,
	MemoryEscrowStorage,
} from "./storage/index.js";

// Concurrency
export { KeyedMutex } from "./concurrency/index.js";

// HTLC escrow
export {
	type Escrow,
	type EscrowStatus,
	type EscrowAction,
	type CreateEscrowParams,
	type EscrowCreated,
	type EscrowCompleted,
	type EscrowCancelled,
	type EscrowEvent,
	type EscrowEventListener,
	type LedgerLogger,
	type HtlcErrorKind,
	type HtlcErrorCode,
	type EscrowLedgerOptions,
	type UnitOfWork,
	ESCROW_STATUSES,
	ESCROW_CREATED,
	ESCROW_COMPLETED,
	ESCROW_CANCELLED,
	HtlcError,
	isHtlcError,
	HTLC_LIFECYCLE,
	isFinalStatus,
	EscrowLedger,
	AdministratorCapability,
	MAX_AMOUNT,
} from "./modules/htlc/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	isHex,
	stringToBytes,
	concatBytes,
	bytesEqual,
} from "./utils/index.js";
