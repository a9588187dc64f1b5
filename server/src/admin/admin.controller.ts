import { Body, Controller, HttpCode, Param, Post } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { EscrowsService } from "../escrows/escrows.service";
import { RevealSecretInDto } from "../escrows/dto/reveal-secret.dto";
import { SettleEscrowOutDto } from "../escrows/dto/get-escrow.dto";
import {
	type ApiEnvelope,
	envelope,
	envelopeSchema,
} from "../common/dto/envelopes";

/**
 * Operator recovery: settle an escrow on a party's behalf with the
 * configured administrator account. Guarded by HTTP Basic auth.
 */
@ApiTags("Admin")
@ApiBasicAuth()
@ApiUnauthorizedResponse({ description: "Missing or wrong Basic credentials" })
@ApiForbiddenResponse({ description: "No administrator configured" })
@Controller("api/v1/admin/escrows")
export class AdminController {
	constructor(private readonly escrowsService: EscrowsService) {}

	@Post(":orderId/:owner/reveal")
	@HttpCode(200)
	@ApiOperation({ summary: "Reveal for the taker; funds still go to the taker" })
	@ApiBody({ type: RevealSecretInDto })
	@ApiOkResponse({ schema: envelopeSchema(SettleEscrowOutDto) })
	async reveal(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
		@Body() dto: RevealSecretInDto,
	): Promise<ApiEnvelope<SettleEscrowOutDto>> {
		const amount = await this.escrowsService.adminReveal(
			orderId,
			owner,
			dto.secret,
		);
		const escrow = await this.escrowsService.get(orderId, owner);
		return envelope({
			orderId,
			owner,
			status: escrow.status,
			amount: amount.toString(),
			recipient: escrow.taker,
		});
	}

	@Post(":orderId/:owner/cancel")
	@HttpCode(200)
	@ApiOperation({ summary: "Cancel for the owner; funds still go to the owner" })
	@ApiOkResponse({ schema: envelopeSchema(SettleEscrowOutDto) })
	async cancel(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<SettleEscrowOutDto>> {
		const amount = await this.escrowsService.adminCancel(orderId, owner);
		return envelope({
			orderId,
			owner,
			status: "cancelled",
			amount: amount.toString(),
			recipient: owner,
		});
	}
}
