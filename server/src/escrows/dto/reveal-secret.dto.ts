import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches } from "class-validator";

export const HEX_PATTERN = /^(0x)?([0-9a-fA-F]{2})*$/;

export class RevealSecretInDto {
	@ApiProperty({
		example: "733363723374",
		description: "The preimage of the hashlock, hex encoded",
	})
	@IsString()
	@Matches(HEX_PATTERN, { message: "secret must be hex encoded" })
	secret!: string;
}

export class ComputeHashInDto {
	@ApiProperty({ example: "616263", description: "Hex encoded bytes" })
	@IsString()
	@Matches(HEX_PATTERN, { message: "data must be hex encoded" })
	data!: string;
}

export class ComputeHashOutDto {
	@ApiProperty({
		example: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
	})
	hash!: string;
}
