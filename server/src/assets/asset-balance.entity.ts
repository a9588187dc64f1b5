import {
	Column,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

@Entity("asset_balances")
@Index(["asset", "account"], { unique: true })
export class AssetBalance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	asset!: string;

	@Index()
	@Column({ type: "text" })
	account!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}
