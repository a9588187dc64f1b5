import { ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from "class-validator";
import { ESCROW_STATUSES, type EscrowStatus } from "@htlc-ledger/sdk";

export class ListEscrowsQueryDto {
	@ApiPropertyOptional()
	@IsOptional()
	@IsString()
	owner?: string;

	@ApiPropertyOptional()
	@IsOptional()
	@IsString()
	taker?: string;

	@ApiPropertyOptional({ enum: [...ESCROW_STATUSES] })
	@IsOptional()
	@IsIn(ESCROW_STATUSES)
	status?: EscrowStatus;

	@ApiPropertyOptional()
	@IsOptional()
	@IsString()
	asset?: string;

	@ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(100)
	limit: number = 20;

	@ApiPropertyOptional({ minimum: 0, default: 0 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(0)
	offset: number = 0;
}
