import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsNumber, IsOptional, IsString, Matches } from "class-validator";

export class CreateEscrowInDto {
	@ApiProperty({
		example: "order-1",
		description: "Caller-chosen id, unique per owner",
	})
	@IsString()
	orderId!: string;

	@ApiProperty({
		example: "5e884898da28047151d0e56f8dc6292773603d0d6aabbdd62a11ef721d1542d8",
		description: "SHA-256 of the secret, 32 bytes hex (0x prefix optional)",
	})
	@IsString()
	secretHash!: string;

	@ApiProperty({ example: "bob", description: "Account paid on reveal" })
	@IsString()
	taker!: string;

	@ApiPropertyOptional({
		example: "usdc",
		description: "Escrowed asset, defaults to the native asset",
	})
	@IsOptional()
	@IsString()
	asset?: string;

	@ApiProperty({
		example: "100",
		description: "Amount in the asset's smallest unit, as a decimal string",
	})
	@Matches(/^[0-9]+$/, { message: "amount must be a decimal integer string" })
	amount!: string;

	@ApiProperty({
		example: 3600,
		description: "Seconds from now until the owner may cancel",
	})
	@IsNumber()
	timelockDuration!: number;
}
