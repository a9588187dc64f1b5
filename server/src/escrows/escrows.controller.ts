import {
	Body,
	Controller,
	Get,
	HttpCode,
	Param,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { EscrowsService } from "./escrows.service";
import {
	type ApiEnvelope,
	type ApiPageEnvelope,
	ApiEnvelopeDto,
	PageMetaDto,
	envelope,
	envelopeSchema,
	pageEnvelope,
} from "../common/dto/envelopes";
import { AccountGuard } from "../auth/account.guard";
import { CallerAccount } from "../auth/caller-account.decorator";
import { CreateEscrowInDto } from "./dto/create-escrow.dto";
import {
	ComputeHashInDto,
	ComputeHashOutDto,
	RevealSecretInDto,
} from "./dto/reveal-secret.dto";
import {
	EscrowFlagDto,
	EscrowStatsDto,
	GetEscrowDto,
	SettleEscrowOutDto,
} from "./dto/get-escrow.dto";
import { ListEscrowsQueryDto } from "./dto/list-escrows-query.dto";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";

const ACCOUNT_HEADER_DOC = {
	name: "X-Account",
	description: "Account the request acts as",
	required: true,
};

@ApiTags("1 - Escrows")
@ApiExtraModels(
	ApiEnvelopeDto,
	PageMetaDto,
	GetEscrowDto,
	SettleEscrowOutDto,
	EscrowFlagDto,
	EscrowStatsDto,
	ComputeHashOutDto,
)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly service: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@UseGuards(AccountGuard)
	@ApiHeader(ACCOUNT_HEADER_DOC)
	@ApiOperation({
		summary: "Lock funds of the calling account in a new escrow",
	})
	@ApiBody({ type: CreateEscrowInDto })
	@ApiCreatedResponse({
		description: "Escrow created",
		schema: envelopeSchema(GetEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing X-Account header" })
	@ApiConflictResponse({ description: "Escrow already exists" })
	async create(
		@CallerAccount() owner: string,
		@Body() dto: CreateEscrowInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.create(owner, dto);
		return envelope(GetEscrowDto.fromEscrow(escrow));
	}

	@Get("")
	@ApiOperation({ summary: "List escrows" })
	@ApiOkResponse({
		description: "A page of escrows, newest first",
		schema: envelopeSchema(GetEscrowDto, { page: true }),
	})
	async list(
		@Query() query: ListEscrowsQueryDto,
	): Promise<ApiPageEnvelope<GetEscrowDto>> {
		const { items, total } = await this.service.list(query);
		return pageEnvelope(items.map(GetEscrowDto.fromEscrow), {
			total,
			offset: query.offset,
		});
	}

	@Get("stats")
	@ApiOperation({ summary: "Ledger counters and clock" })
	@ApiOkResponse({ schema: envelopeSchema(EscrowStatsDto) })
	async stats(): Promise<ApiEnvelope<EscrowStatsDto>> {
		return envelope(await this.service.stats());
	}

	@Post("hash")
	@HttpCode(200)
	@ApiOperation({ summary: "SHA-256 of hex data, in hashlock format" })
	@ApiBody({ type: ComputeHashInDto })
	@ApiOkResponse({ schema: envelopeSchema(ComputeHashOutDto) })
	computeHash(@Body() dto: ComputeHashInDto): ApiEnvelope<ComputeHashOutDto> {
		return envelope({ hash: this.service.computeHash(dto.data) });
	}

	@Sse("events")
	@ApiOperation({ summary: "Subscribe to escrow events" })
	@ApiQuery({ name: "orderId", required: false })
	@ApiQuery({ name: "owner", required: false })
	events(
		@Query("orderId") orderId?: string,
		@Query("owner") owner?: string,
	): Observable<SseEvent> {
		return this.sseService.escrowEvents({ orderId, owner }).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":orderId/:owner")
	@ApiOperation({ summary: "Get an escrow" })
	@ApiParam({ name: "orderId" })
	@ApiParam({ name: "owner" })
	@ApiOkResponse({ schema: envelopeSchema(GetEscrowDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async getOne(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.get(orderId, owner);
		return envelope(GetEscrowDto.fromEscrow(escrow));
	}

	@Get(":orderId/:owner/exists")
	@ApiOperation({ summary: "Whether an escrow was ever created" })
	@ApiOkResponse({ schema: envelopeSchema(EscrowFlagDto) })
	async exists(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<EscrowFlagDto>> {
		return envelope({ value: await this.service.exists(orderId, owner) });
	}

	@Get(":orderId/:owner/active")
	@ApiOperation({ summary: "Whether an escrow is still active" })
	@ApiOkResponse({ schema: envelopeSchema(EscrowFlagDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async isActive(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<EscrowFlagDto>> {
		return envelope({ value: await this.service.isActive(orderId, owner) });
	}

	@Get(":orderId/:owner/timelock-expired")
	@ApiOperation({ summary: "Whether the owner may cancel by now" })
	@ApiOkResponse({ schema: envelopeSchema(EscrowFlagDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async isTimelockExpired(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
	): Promise<ApiEnvelope<EscrowFlagDto>> {
		return envelope({
			value: await this.service.isTimelockExpired(orderId, owner),
		});
	}

	@Post(":orderId/:owner/reveal")
	@HttpCode(200)
	@UseGuards(AccountGuard)
	@ApiHeader(ACCOUNT_HEADER_DOC)
	@ApiOperation({
		summary: "Reveal the secret and release the funds to the taker",
	})
	@ApiBody({ type: RevealSecretInDto })
	@ApiOkResponse({ schema: envelopeSchema(SettleEscrowOutDto) })
	@ApiForbiddenResponse({ description: "Caller is not the taker" })
	@ApiConflictResponse({ description: "Escrow is not active" })
	@ApiUnprocessableEntityResponse({
		description: "Wrong secret, or the timelock has expired",
	})
	async reveal(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
		@Body() dto: RevealSecretInDto,
		@CallerAccount() caller: string,
	): Promise<ApiEnvelope<SettleEscrowOutDto>> {
		const amount = await this.service.reveal(orderId, owner, dto.secret, caller);
		const escrow = await this.service.get(orderId, owner);
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
	@UseGuards(AccountGuard)
	@ApiHeader(ACCOUNT_HEADER_DOC)
	@ApiOperation({
		summary: "Refund the owner once the timelock has expired",
	})
	@ApiOkResponse({ schema: envelopeSchema(SettleEscrowOutDto) })
	@ApiForbiddenResponse({ description: "Caller is not the owner" })
	@ApiConflictResponse({ description: "Escrow is not active" })
	@ApiUnprocessableEntityResponse({ description: "Timelock not expired" })
	async cancel(
		@Param("orderId") orderId: string,
		@Param("owner") owner: string,
		@CallerAccount() caller: string,
	): Promise<ApiEnvelope<SettleEscrowOutDto>> {
		const amount = await this.service.cancel(orderId, owner, caller);
		return envelope({
			orderId,
			owner,
			status: "cancelled",
			amount: amount.toString(),
			recipient: owner,
		});
	}
}
