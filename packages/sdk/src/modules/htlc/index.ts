/**
 * HTLC Module
 *
 * Hash time-locked escrow ledger built on SDK primitives: a lifecycle table,
 * pluggable storage, an injected custody capability and an injected clock.
 */

export type {
	Escrow,
	EscrowStatus,
	EscrowAction,
	CreateEscrowParams,
	EscrowCreated,
	EscrowCompleted,
	EscrowCancelled,
	EscrowEvent,
	EscrowEventListener,
	LedgerLogger,
} from "./types.js";

export {
	ESCROW_STATUSES,
	ESCROW_CREATED,
	ESCROW_COMPLETED,
	ESCROW_CANCELLED,
} from "./types.js";

export {
	type HtlcErrorKind,
	type HtlcErrorCode,
	HtlcError,
	isHtlcError,
} from "./errors.js";

export { HTLC_LIFECYCLE, isFinalStatus } from "./htlc-lifecycle.js";

export {
	type EscrowLedgerOptions,
	type UnitOfWork,
	EscrowLedger,
	AdministratorCapability,
	MAX_AMOUNT,
} from "./escrow-ledger.js";
