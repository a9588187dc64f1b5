import { ApiProperty } from "@nestjs/swagger";

export class GetBalanceDto {
	@ApiProperty({ example: "usdc" })
	asset!: string;

	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "900", description: "Decimal string" })
	balance!: string;
}
