import { Body, Controller, Get, Param, Post } from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { AssetsService } from "./assets.service";
import { MintAssetInDto } from "./dto/mint-asset.dto";
import { GetBalanceDto } from "./dto/get-balance.dto";
import {
	type ApiEnvelope,
	envelope,
	envelopeSchema,
} from "../common/dto/envelopes";

@ApiTags("2 - Assets")
@ApiExtraModels(GetBalanceDto)
@Controller("api/v1/assets")
export class AssetsController {
	constructor(private readonly service: AssetsService) {}

	@Post(":asset/mint")
	@ApiOperation({ summary: "Mint units of an asset to an account" })
	@ApiParam({ name: "asset", description: "Asset identifier" })
	@ApiBody({ type: MintAssetInDto })
	@ApiCreatedResponse({
		description: "Balance after minting",
		schema: envelopeSchema(GetBalanceDto),
	})
	@ApiBadRequestResponse({ description: "Amount is not positive" })
	async mint(
		@Param("asset") asset: string,
		@Body() dto: MintAssetInDto,
	): Promise<ApiEnvelope<GetBalanceDto>> {
		const balance = await this.service.mint(
			asset,
			dto.account,
			BigInt(dto.amount),
		);
		return envelope({
			asset,
			account: dto.account,
			balance: balance.toString(),
		});
	}

	@Get(":asset/balances/:account")
	@ApiOperation({ summary: "Balance of an account" })
	@ApiOkResponse({ schema: envelopeSchema(GetBalanceDto) })
	async balance(
		@Param("asset") asset: string,
		@Param("account") account: string,
	): Promise<ApiEnvelope<GetBalanceDto>> {
		const balance = await this.service.balanceOf(asset, account);
		return envelope({ asset, account, balance: balance.toString() });
	}
}
