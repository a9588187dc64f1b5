import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Repository } from "typeorm";
import { nanoid } from "nanoid";
import {
	type AccountId,
	type Clock,
	ESCROW_CANCELLED,
	ESCROW_COMPLETED,
	ESCROW_CREATED,
	type Escrow,
	EscrowLedger,
	type EscrowEvent,
	type EscrowQueryResult,
	hexToBytes,
	NATIVE_ASSET,
} from "@htlc-ledger/sdk";
import { AssetsService } from "../assets/assets.service";
import { TransactionRunner } from "../common/transaction-runner";
import { EscrowRecord } from "./escrow-record.entity";
import { TypeOrmEscrowStorage } from "./typeorm-escrow-storage";
import { LEDGER_CLOCK } from "./escrow-clock";
import { CreateEscrowInDto } from "./dto/create-escrow.dto";
import { ListEscrowsQueryDto } from "./dto/list-escrows-query.dto";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_COMPLETED_ID,
	ESCROW_CREATED_ID,
	type EscrowCancelledEvent,
	type EscrowCompletedEvent,
	type EscrowCreatedEvent,
} from "../common/escrow.event";

export type EscrowStats = {
	escrowCount: number;
	administrator: AccountId | null;
	currentTimestamp: number;
};

/**
 * Hosts the process-wide EscrowLedger on top of the database and the asset
 * balances, and republishes ledger events on the application event bus.
 */
@Injectable()
export class EscrowsService {
	private readonly logger = new Logger(EscrowsService.name);
	private readonly ledger: EscrowLedger;

	constructor(
		private readonly configService: ConfigService,
		@InjectRepository(EscrowRecord)
		escrowRepository: Repository<EscrowRecord>,
		assetsService: AssetsService,
		transactions: TransactionRunner,
		private readonly events: EventEmitter2,
		@Inject(LEDGER_CLOCK) clock: Clock,
	) {
		const administrator =
			this.configService.get<string>("ESCROW_ADMIN_ACCOUNT") || undefined;
		if (administrator) {
			this.logger.log(`ESCROW_ADMIN_ACCOUNT=${administrator}`);
		} else {
			this.logger.warn("ESCROW_ADMIN_ACCOUNT is not set, admin overrides disabled");
		}
		this.ledger = new EscrowLedger({
			storage: new TypeOrmEscrowStorage(escrowRepository),
			assets: assetsService,
			clock,
			administrator,
			listener: (event) => this.publish(event),
			logger: new Logger(EscrowLedger.name),
			transaction: (work) => transactions.run(work),
		});
	}

	async create(owner: AccountId, dto: CreateEscrowInDto): Promise<Escrow> {
		return this.ledger.createEscrow({
			orderId: dto.orderId,
			secretHash: dto.secretHash,
			owner,
			taker: dto.taker,
			asset: dto.asset ?? NATIVE_ASSET,
			amount: BigInt(dto.amount),
			timelockDuration: dto.timelockDuration,
		});
	}

	async reveal(
		orderId: string,
		owner: AccountId,
		secretHex: string,
		caller: AccountId,
	): Promise<bigint> {
		return this.ledger.revealSecret(
			orderId,
			owner,
			hexToBytes(secretHex),
			caller,
		);
	}

	async cancel(
		orderId: string,
		owner: AccountId,
		caller: AccountId,
	): Promise<bigint> {
		return this.ledger.cancelEscrow(orderId, owner, caller);
	}

	/**
	 * Reveal on the taker's behalf as the configured administrator. The
	 * taker is still the one paid.
	 */
	async adminReveal(
		orderId: string,
		owner: AccountId,
		secretHex: string,
	): Promise<bigint> {
		const capability = this.ledger.administratorCapability(
			this.administratorAccount(),
		);
		return this.ledger.revealSecret(
			orderId,
			owner,
			hexToBytes(secretHex),
			capability.account,
			capability,
		);
	}

	async adminCancel(orderId: string, owner: AccountId): Promise<bigint> {
		const capability = this.ledger.administratorCapability(
			this.administratorAccount(),
		);
		return this.ledger.cancelEscrow(
			orderId,
			owner,
			capability.account,
			capability,
		);
	}

	async get(orderId: string, owner: AccountId): Promise<Escrow> {
		return this.ledger.getEscrow(orderId, owner);
	}

	async exists(orderId: string, owner: AccountId): Promise<boolean> {
		return this.ledger.escrowExists(orderId, owner);
	}

	async isActive(orderId: string, owner: AccountId): Promise<boolean> {
		return this.ledger.isActive(orderId, owner);
	}

	async isTimelockExpired(orderId: string, owner: AccountId): Promise<boolean> {
		return this.ledger.isTimelockExpired(orderId, owner);
	}

	async list(query: ListEscrowsQueryDto): Promise<EscrowQueryResult> {
		return this.ledger.listEscrows({
			owner: query.owner,
			taker: query.taker,
			status: query.status,
			asset: query.asset,
			limit: query.limit,
			offset: query.offset,
		});
	}

	async stats(): Promise<EscrowStats> {
		return {
			escrowCount: await this.ledger.getEscrowCount(),
			administrator: this.ledger.getAdministrator() ?? null,
			currentTimestamp: this.ledger.currentTimestamp(),
		};
	}

	/** The ledger clock, unix seconds. */
	now(): number {
		return this.ledger.currentTimestamp();
	}

	computeHash(dataHex: string): string {
		return this.ledger.computeHash(hexToBytes(dataHex));
	}

	private administratorAccount(): AccountId {
		// An empty name never matches, so the ledger answers NotAuthorized
		return this.ledger.getAdministrator() ?? "";
	}

	private publish(event: EscrowEvent): void {
		switch (event.type) {
			case ESCROW_CREATED: {
				const { amount, ...rest } = event.payload;
				this.events.emit(ESCROW_CREATED_ID, {
					eventId: nanoid(8),
					...rest,
					amount: amount.toString(),
				} satisfies EscrowCreatedEvent);
				break;
			}
			case ESCROW_COMPLETED: {
				const { amount, ...rest } = event.payload;
				this.events.emit(ESCROW_COMPLETED_ID, {
					eventId: nanoid(8),
					...rest,
					amount: amount.toString(),
				} satisfies EscrowCompletedEvent);
				break;
			}
			case ESCROW_CANCELLED: {
				const { amount, ...rest } = event.payload;
				this.events.emit(ESCROW_CANCELLED_ID, {
					eventId: nanoid(8),
					...rest,
					amount: amount.toString(),
				} satisfies EscrowCancelledEvent);
				break;
			}
		}
	}
}
