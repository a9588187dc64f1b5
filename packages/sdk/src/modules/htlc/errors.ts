/**
 * HTLC errors
 */

import { LedgerError } from "../../lifecycle/types.js";

/**
 * Coarse failure categories, stable across operations.
 */
export type HtlcErrorKind =
	| "InvalidInput"
	| "Conflict"
	| "NotFound"
	| "NotActive"
	| "Unauthorized"
	| "TimingViolation"
	| "HashMismatch"
	| "TransferFailed";

export type HtlcErrorCode =
	| "InvalidAmount"
	| "InvalidHash"
	| "InvalidTimelock"
	| "InvalidOwner"
	| "InvalidTaker"
	| "InvalidOrderId"
	| "EscrowAlreadyExists"
	| "EscrowNotFound"
	| "EscrowNotActive"
	| "NotAuthorized"
	| "TimelockExpired"
	| "TimelockNotExpired"
	| "HashMismatch"
	| "AssetTransferFailed";

const KIND_BY_CODE: Record<HtlcErrorCode, HtlcErrorKind> = {
	InvalidAmount: "InvalidInput",
	InvalidHash: "InvalidInput",
	InvalidTimelock: "InvalidInput",
	InvalidOwner: "InvalidInput",
	InvalidTaker: "InvalidInput",
	InvalidOrderId: "InvalidInput",
	EscrowAlreadyExists: "Conflict",
	EscrowNotFound: "NotFound",
	EscrowNotActive: "NotActive",
	NotAuthorized: "Unauthorized",
	TimelockExpired: "TimingViolation",
	TimelockNotExpired: "TimingViolation",
	HashMismatch: "HashMismatch",
	AssetTransferFailed: "TransferFailed",
};

/**
 * Error raised by every escrow ledger operation. When one is thrown, no
 * state was changed and no asset was moved.
 */
export class HtlcError extends LedgerError {
	declare readonly code: HtlcErrorCode;
	public readonly kind: HtlcErrorKind;

	constructor(code: HtlcErrorCode, message: string, details?: unknown) {
		super(message, code, details);
		this.name = "HtlcError";
		this.kind = KIND_BY_CODE[code];
	}
}

export function isHtlcError(err: unknown): err is HtlcError {
	return err instanceof HtlcError;
}
