/**
 * HTLC Module Types
 *
 * Types specific to the hash time-locked escrow.
 */

import type { AccountId, AssetId } from "../../assets/types.js";

/**
 * Escrow lifecycle.
 *
 * - active: funds in custody, awaiting the secret or the deadline
 * - completed: secret revealed before the deadline, funds released to taker
 * - cancelled: deadline passed, funds returned to owner
 */
export type EscrowStatus = "active" | "completed" | "cancelled";

export const ESCROW_STATUSES: readonly EscrowStatus[] = [
	"active",
	"completed",
	"cancelled",
];

export type EscrowAction = "reveal" | "cancel";

/**
 * A single hash time-locked deposit, identified by (orderId, owner).
 */
export interface Escrow {
	/** Caller-chosen order identifier, unique per owner */
	orderId: string;
	/** SHA-256 of the secret, lowercase hex */
	secretHash: string;
	/** Depositor, refunded on cancellation */
	owner: AccountId;
	/** Beneficiary on completion */
	taker: AccountId;
	/** Escrowed asset */
	asset: AssetId;
	/** Escrowed quantity */
	amount: bigint;
	/** Unix seconds: completion allowed before, cancellation at or after */
	timelock: number;
	status: EscrowStatus;
	/** Unix seconds */
	createdAt: number;
	/** Unix seconds, set when the secret was revealed */
	completedAt?: number;
	/** Unix seconds, set when the escrow was cancelled */
	cancelledAt?: number;
}

/**
 * Parameters for creating an escrow. The owner is the depositor.
 */
export interface CreateEscrowParams {
	orderId: string;
	/** 32-byte digest, as hex (optionally 0x-prefixed) or bytes */
	secretHash: string | Uint8Array;
	owner: AccountId;
	taker: AccountId;
	asset: AssetId;
	amount: bigint;
	/** Seconds from now until the timelock */
	timelockDuration: number;
}

export const ESCROW_CREATED = "escrow.created";
export type EscrowCreated = {
	orderId: string;
	owner: AccountId;
	taker: AccountId;
	asset: AssetId;
	amount: bigint;
	timelock: number;
	secretHash: string;
};

export const ESCROW_COMPLETED = "escrow.completed";
export type EscrowCompleted = {
	orderId: string;
	owner: AccountId;
	taker: AccountId;
	amount: bigint;
	/** Revealed preimage, hex */
	secret: string;
};

export const ESCROW_CANCELLED = "escrow.cancelled";
export type EscrowCancelled = {
	orderId: string;
	owner: AccountId;
	amount: bigint;
};

export type EscrowEvent =
	| { type: typeof ESCROW_CREATED; payload: EscrowCreated }
	| { type: typeof ESCROW_COMPLETED; payload: EscrowCompleted }
	| { type: typeof ESCROW_CANCELLED; payload: EscrowCancelled };

/**
 * Receives ledger notifications after each successful transition.
 */
export type EscrowEventListener = (event: EscrowEvent) => void;

/**
 * Minimal logger accepted by the ledger. A NestJS `Logger` fits.
 */
export interface LedgerLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, stack?: string): void;
}
