import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ESCROW_STATUSES, type Escrow, type EscrowStatus } from "@htlc-ledger/sdk";

export class GetEscrowDto {
	@ApiProperty({ example: "order-1" })
	orderId!: string;

	@ApiProperty({ example: "alice" })
	owner!: string;

	@ApiProperty({ example: "bob" })
	taker!: string;

	@ApiProperty({ example: "usdc" })
	asset!: string;

	@ApiProperty({ example: "100", description: "Decimal string" })
	amount!: string;

	@ApiProperty({ description: "SHA-256 hashlock, lowercase hex" })
	secretHash!: string;

	@ApiProperty({ description: "Unix seconds; reveal before, cancel from" })
	timelock!: number;

	@ApiProperty({ enum: [...ESCROW_STATUSES] })
	status!: EscrowStatus;

	@ApiProperty({ description: "Unix seconds" })
	createdAt!: number;

	@ApiPropertyOptional({ description: "Unix seconds" })
	completedAt?: number;

	@ApiPropertyOptional({ description: "Unix seconds" })
	cancelledAt?: number;

	static fromEscrow(escrow: Escrow): GetEscrowDto {
		return {
			orderId: escrow.orderId,
			owner: escrow.owner,
			taker: escrow.taker,
			asset: escrow.asset,
			amount: escrow.amount.toString(),
			secretHash: escrow.secretHash,
			timelock: escrow.timelock,
			status: escrow.status,
			createdAt: escrow.createdAt,
			completedAt: escrow.completedAt,
			cancelledAt: escrow.cancelledAt,
		};
	}
}

export class SettleEscrowOutDto {
	@ApiProperty({ example: "order-1" })
	orderId!: string;

	@ApiProperty({ example: "alice" })
	owner!: string;

	@ApiProperty({ enum: ["completed", "cancelled"] })
	status!: EscrowStatus;

	@ApiProperty({ example: "100", description: "Amount paid out" })
	amount!: string;

	@ApiProperty({ example: "bob", description: "Account that received it" })
	recipient!: string;
}

export class EscrowFlagDto {
	@ApiProperty()
	value!: boolean;
}

export class EscrowStatsDto {
	@ApiProperty({ description: "Escrows ever created" })
	escrowCount!: number;

	@ApiProperty({ nullable: true, type: String })
	administrator!: string | null;

	@ApiProperty({ description: "Ledger clock, unix seconds" })
	currentTimestamp!: number;
}
