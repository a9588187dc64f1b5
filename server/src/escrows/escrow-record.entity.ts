import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { ESCROW_STATUSES, type EscrowStatus } from "@htlc-ledger/sdk";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

@Entity("escrows")
@Index(["orderId", "owner"], { unique: true })
export class EscrowRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	/** deriveEscrowKey(orderId, owner) */
	@Index({ unique: true })
	@Column({ type: "text" })
	key!: string;

	@Column({ type: "text" })
	orderId!: string;

	@Index()
	@Column({ type: "text" })
	owner!: string;

	@Index()
	@Column({ type: "text" })
	taker!: string;

	@Index()
	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	secretHash!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	// Unix seconds, from the ledger clock
	@Column({ type: "integer" })
	timelock!: number;

	@Index()
	@Column({ type: "text", enum: ESCROW_STATUSES })
	status!: EscrowStatus;

	@Column({ type: "integer" })
	createdAt!: number;

	@Column({ type: "integer", nullable: true })
	completedAt?: number | null;

	@Column({ type: "integer", nullable: true })
	cancelledAt?: number | null;

	@CreateDateColumn()
	insertedAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
