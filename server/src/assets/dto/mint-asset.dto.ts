import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, Matches } from "class-validator";

export class MintAssetInDto {
	@ApiProperty({ example: "alice", description: "Account to credit" })
	@IsString()
	@IsNotEmpty()
	account!: string;

	@ApiProperty({
		example: "1000",
		description: "Amount in the asset's smallest unit, as a decimal string",
	})
	@Matches(/^[0-9]+$/, { message: "amount must be a decimal integer string" })
	amount!: string;
}
