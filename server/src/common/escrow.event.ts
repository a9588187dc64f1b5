import type { AccountId, AssetId } from "@htlc-ledger/sdk";

export const ESCROW_CREATED_ID = "escrow.created";
export type EscrowCreatedEvent = {
	eventId: string;
	orderId: string;
	owner: AccountId;
	taker: AccountId;
	asset: AssetId;
	amount: string; // decimal, bigint does not survive JSON
	timelock: number;
	secretHash: string;
};

export const ESCROW_COMPLETED_ID = "escrow.completed";
export type EscrowCompletedEvent = {
	eventId: string;
	orderId: string;
	owner: AccountId;
	taker: AccountId;
	amount: string;
	secret: string;
};

export const ESCROW_CANCELLED_ID = "escrow.cancelled";
export type EscrowCancelledEvent = {
	eventId: string;
	orderId: string;
	owner: AccountId;
	amount: string;
};
