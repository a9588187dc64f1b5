/**
 * Escrow Ledger
 *
 * Hash time-locked escrow over an injected custody capability and clock.
 * One instance holds every escrow of a deployment and enforces:
 *
 * - creation pulls the deposit into custody and registers an `active` record
 * - the taker (or an administrator override) completes it with the preimage
 *   strictly before the timelock
 * - the owner (or an administrator override) cancels it at or after the
 *   timelock
 *
 * The two completion windows never overlap, so one deposit can never be
 * paid out twice. Every state-changing call runs under a per-key lock.
 */

import { LedgerError } from "../../lifecycle/index.js";
import {
	AccountId,
	AssetTransfer,
	AssetTransferError,
} from "../../assets/types.js";
import { Clock, systemClock } from "../../core/clock.js";
import {
	deriveEscrowKey,
	isZeroDigest,
	parseDigest,
	sha256Hex,
	verifySecret,
} from "../../core/hashing.js";
import { KeyedMutex } from "../../concurrency/keyed-mutex.js";
import {
	EscrowQueryOptions,
	EscrowQueryResult,
	EscrowStorage,
	StorageError,
} from "../../storage/types.js";
import { bytesToHex } from "../../utils/encoding.js";
import { HtlcError } from "./errors.js";
import { HTLC_LIFECYCLE } from "./htlc-lifecycle.js";
import {
	CreateEscrowParams,
	ESCROW_CANCELLED,
	ESCROW_COMPLETED,
	ESCROW_CREATED,
	Escrow,
	EscrowAction,
	EscrowEvent,
	EscrowEventListener,
	EscrowStatus,
	LedgerLogger,
} from "./types.js";

/** Largest amount any supported ledger can represent (uint256) */
export const MAX_AMOUNT = (1n << 256n) - 1n;

/**
 * Runs `work` so that its storage writes and asset moves commit or roll
 * back together.
 */
export type UnitOfWork = <T>(work: () => Promise<T>) => Promise<T>;

type RollbackStep = () => Promise<void>;

export interface EscrowLedgerOptions {
	storage: EscrowStorage;
	assets: AssetTransfer;
	/** Defaults to the system clock */
	clock?: Clock;
	/**
	 * Deployment-wide account allowed to reveal or cancel on behalf of any
	 * party. Leave unset for a fully trustless ledger.
	 */
	administrator?: AccountId;
	listener?: EscrowEventListener;
	logger?: LedgerLogger;
	/**
	 * Shared transaction over `storage` and `assets`. Without one, a failed
	 * step is undone by compensating calls.
	 */
	transaction?: UnitOfWork;
}

/**
 * Proof that the holder may act as the deployment administrator.
 *
 * Obtained from `EscrowLedger.administratorCapability` and passed
 * explicitly to `revealSecret` / `cancelEscrow`. Using it trades away
 * trustlessness: the administrator can force either outcome within the
 * timing rules.
 */
export class AdministratorCapability {
	constructor(public readonly account: AccountId) {}
}

const silentLogger: LedgerLogger = {
	log: () => {},
	warn: () => {},
	error: () => {},
};

export class EscrowLedger {
	private readonly storage: EscrowStorage;
	private readonly assets: AssetTransfer;
	private readonly clock: Clock;
	private readonly administrator?: AccountId;
	private readonly listener?: EscrowEventListener;
	private readonly logger: LedgerLogger;
	private readonly transaction?: UnitOfWork;
	private readonly mutex = new KeyedMutex();
	private readonly issuedCapabilities = new WeakSet<AdministratorCapability>();

	constructor(options: EscrowLedgerOptions) {
		this.storage = options.storage;
		this.assets = options.assets;
		this.clock = options.clock ?? systemClock;
		this.administrator = options.administrator;
		this.listener = options.listener;
		this.logger = options.logger ?? silentLogger;
		this.transaction = options.transaction;
	}

	/**
	 * Issue an administrator capability for `account`.
	 *
	 * @throws HtlcError NotAuthorized if no administrator is configured or
	 * `account` is not it
	 */
	administratorCapability(account: AccountId): AdministratorCapability {
		if (this.administrator === undefined || account !== this.administrator) {
			throw new HtlcError(
				"NotAuthorized",
				`Account ${account} is not the ledger administrator`,
			);
		}
		const capability = new AdministratorCapability(account);
		this.issuedCapabilities.add(capability);
		return capability;
	}

	/**
	 * Deposit `amount` of `asset` from the owner and register an active
	 * escrow locked by `secretHash` until now + `timelockDuration`.
	 */
	async createEscrow(params: CreateEscrowParams): Promise<Escrow> {
		const secretHash = this.validateCreation(params);
		const { orderId, owner, taker, asset, amount } = params;
		const key = deriveEscrowKey(orderId, owner);

		return this.mutex.runExclusive(key, async () => {
			if (await this.storage.exists(key)) {
				throw new HtlcError(
					"EscrowAlreadyExists",
					`Escrow ${orderId} already exists for owner ${owner}`,
					{ orderId, owner },
				);
			}

			const now = this.clock.now();
			const timelock = now + params.timelockDuration;
			if (!Number.isSafeInteger(timelock)) {
				throw new HtlcError(
					"InvalidTimelock",
					`Invalid timelock duration: ${now} + ${params.timelockDuration} overflows`,
					{ timelockDuration: params.timelockDuration, now },
				);
			}
			const escrow: Escrow = {
				orderId,
				secretHash,
				owner,
				taker,
				asset,
				amount,
				timelock,
				status: HTLC_LIFECYCLE.initial,
				createdAt: now,
			};

			await this.atomically(async (onRollback) => {
				await this.moveAssets(() => this.assets.pull(asset, owner, amount), {
					orderId,
					owner,
				});
				onRollback(() => this.assets.push(asset, owner, amount));

				try {
					await this.storage.insert(key, escrow);
				} catch (err) {
					this.logger.warn(`Storing escrow ${orderId}/${owner} failed`);
					if (err instanceof StorageError && err.code === "DUPLICATE_KEY") {
						throw new HtlcError(
							"EscrowAlreadyExists",
							`Escrow ${orderId} already exists for owner ${owner}`,
							{ orderId, owner },
						);
					}
					throw err;
				}
			}, `create escrow ${orderId}/${owner}`);

			this.logger.log(
				`Escrow ${orderId}/${owner} created: ${amount} ${asset} for ${taker}, timelock ${escrow.timelock}`,
			);
			this.emit({
				type: ESCROW_CREATED,
				payload: {
					orderId,
					owner,
					taker,
					asset,
					amount,
					timelock: escrow.timelock,
					secretHash,
				},
			});
			return { ...escrow };
		});
	}

	/**
	 * Release the escrow to its taker by revealing the preimage of its
	 * hashlock. Must happen strictly before the timelock.
	 *
	 * @returns the amount transferred to the taker
	 */
	async revealSecret(
		orderId: string,
		owner: AccountId,
		secret: Uint8Array,
		caller: AccountId,
		override?: AdministratorCapability,
	): Promise<bigint> {
		const key = deriveEscrowKey(orderId, owner);

		return this.mutex.runExclusive(key, async () => {
			const escrow = await this.requireEscrow(key, orderId, owner);
			const status = this.nextStatus(escrow, "reveal");
			this.authorize(caller, escrow.taker, override, "reveal secret for", escrow);

			// A wrong secret is reported as such whatever the time
			if (!verifySecret(secret, escrow.secretHash)) {
				throw new HtlcError(
					"HashMismatch",
					"Provided secret does not match stored hash",
					{ orderId, owner },
				);
			}
			const now = this.clock.now();
			if (now >= escrow.timelock) {
				throw new HtlcError(
					"TimelockExpired",
					`Timelock expired at ${escrow.timelock}: cannot reveal secret at ${now}`,
					{ orderId, owner, timelock: escrow.timelock, now },
				);
			}

			await this.settle(
				key,
				escrow,
				{ ...escrow, status, completedAt: now },
				escrow.taker,
			);

			this.logger.log(
				`Escrow ${orderId}/${owner} completed: ${escrow.amount} ${escrow.asset} released to ${escrow.taker}`,
			);
			this.emit({
				type: ESCROW_COMPLETED,
				payload: {
					orderId,
					owner,
					taker: escrow.taker,
					amount: escrow.amount,
					secret: bytesToHex(secret),
				},
			});
			return escrow.amount;
		});
	}

	/**
	 * Refund the escrow to its owner once the timelock has been reached.
	 *
	 * @returns the amount returned to the owner
	 */
	async cancelEscrow(
		orderId: string,
		owner: AccountId,
		caller: AccountId,
		override?: AdministratorCapability,
	): Promise<bigint> {
		const key = deriveEscrowKey(orderId, owner);

		return this.mutex.runExclusive(key, async () => {
			const escrow = await this.requireEscrow(key, orderId, owner);
			const status = this.nextStatus(escrow, "cancel");
			this.authorize(caller, escrow.owner, override, "cancel", escrow);

			const now = this.clock.now();
			if (now < escrow.timelock) {
				throw new HtlcError(
					"TimelockNotExpired",
					`Timelock not expired: cannot cancel before ${escrow.timelock} (now ${now})`,
					{ orderId, owner, timelock: escrow.timelock, now },
				);
			}

			await this.settle(
				key,
				escrow,
				{ ...escrow, status, cancelledAt: now },
				escrow.owner,
			);

			this.logger.log(
				`Escrow ${orderId}/${owner} cancelled: ${escrow.amount} ${escrow.asset} returned`,
			);
			this.emit({
				type: ESCROW_CANCELLED,
				payload: { orderId, owner, amount: escrow.amount },
			});
			return escrow.amount;
		});
	}

	async escrowExists(orderId: string, owner: AccountId): Promise<boolean> {
		return this.storage.exists(deriveEscrowKey(orderId, owner));
	}

	/**
	 * @throws HtlcError EscrowNotFound
	 */
	async getEscrow(orderId: string, owner: AccountId): Promise<Escrow> {
		return this.requireEscrow(deriveEscrowKey(orderId, owner), orderId, owner);
	}

	/**
	 * @throws HtlcError EscrowNotFound
	 */
	async isActive(orderId: string, owner: AccountId): Promise<boolean> {
		const escrow = await this.getEscrow(orderId, owner);
		return escrow.status === "active";
	}

	/**
	 * Whether cancellation is now permitted by time (now >= timelock).
	 *
	 * @throws HtlcError EscrowNotFound
	 */
	async isTimelockExpired(orderId: string, owner: AccountId): Promise<boolean> {
		const escrow = await this.getEscrow(orderId, owner);
		return this.clock.now() >= escrow.timelock;
	}

	async listEscrows(options?: EscrowQueryOptions): Promise<EscrowQueryResult> {
		return this.storage.query(options);
	}

	/**
	 * Number of escrows ever created. Records are never removed.
	 */
	async getEscrowCount(): Promise<number> {
		return this.storage.count();
	}

	getAdministrator(): AccountId | undefined {
		return this.administrator;
	}

	currentTimestamp(): number {
		return this.clock.now();
	}

	/**
	 * SHA-256 of `data` as lowercase hex, the hashlock format the ledger
	 * expects.
	 */
	computeHash(data: Uint8Array): string {
		return sha256Hex(data);
	}

	/**
	 * Check a secret against a hashlock without touching any escrow.
	 *
	 * @throws HtlcError InvalidHash if `expectedHash` is not a 32-byte digest
	 */
	validateSecretHash(
		secret: Uint8Array,
		expectedHash: string | Uint8Array,
	): boolean {
		const digest = parseDigest(expectedHash);
		if (digest === undefined) {
			throw new HtlcError("InvalidHash", "Hash must be 32 bytes");
		}
		return verifySecret(secret, digest);
	}

	private validateCreation(params: CreateEscrowParams): string {
		if (params.orderId.length === 0) {
			throw new HtlcError("InvalidOrderId", "Order id must not be empty");
		}
		if (params.amount <= 0n) {
			throw new HtlcError(
				"InvalidAmount",
				"Invalid amount: must be greater than zero",
				{ amount: params.amount.toString() },
			);
		}
		if (params.amount > MAX_AMOUNT) {
			throw new HtlcError(
				"InvalidAmount",
				"Invalid amount: exceeds 256 bits",
				{ amount: params.amount.toString() },
			);
		}
		const secretHash = parseDigest(params.secretHash);
		if (secretHash === undefined) {
			throw new HtlcError("InvalidHash", "Invalid hash: must be 32 bytes");
		}
		if (isZeroDigest(secretHash)) {
			throw new HtlcError("InvalidHash", "Invalid hash: zero digest");
		}
		if (
			!Number.isSafeInteger(params.timelockDuration) ||
			params.timelockDuration <= 0
		) {
			throw new HtlcError(
				"InvalidTimelock",
				"Invalid timelock duration: must be a positive whole number of seconds",
				{ timelockDuration: params.timelockDuration },
			);
		}
		if (this.assets.isCustody(params.owner)) {
			throw new HtlcError(
				"InvalidOwner",
				`Owner ${params.owner} is the escrow custody`,
				{ owner: params.owner },
			);
		}
		if (params.taker.length === 0) {
			throw new HtlcError("InvalidTaker", "Taker must not be empty");
		}
		if (this.assets.isCustody(params.taker)) {
			throw new HtlcError(
				"InvalidTaker",
				`Taker ${params.taker} is the escrow custody`,
				{ taker: params.taker },
			);
		}
		return secretHash;
	}

	private async requireEscrow(
		key: string,
		orderId: string,
		owner: AccountId,
	): Promise<Escrow> {
		const escrow = await this.storage.load(key);
		if (!escrow) {
			throw new HtlcError(
				"EscrowNotFound",
				`Escrow ${orderId} not found for owner ${owner}`,
				{ orderId, owner },
			);
		}
		return escrow;
	}

	private nextStatus(escrow: Escrow, action: EscrowAction): EscrowStatus {
		if (!HTLC_LIFECYCLE.can(escrow.status, action)) {
			throw new HtlcError(
				"EscrowNotActive",
				`Escrow ${escrow.orderId} is not active (status: ${escrow.status})`,
				{ orderId: escrow.orderId, owner: escrow.owner, status: escrow.status },
			);
		}
		return HTLC_LIFECYCLE.next(escrow.status, action);
	}

	private authorize(
		caller: AccountId,
		beneficiary: AccountId,
		override: AdministratorCapability | undefined,
		verb: string,
		escrow: Escrow,
	): void {
		if (caller === beneficiary) return;
		if (override && this.issuedCapabilities.has(override)) {
			this.logger.warn(
				`Administrator ${override.account} overriding ${verb} escrow ${escrow.orderId}/${escrow.owner} (caller ${caller})`,
			);
			return;
		}
		throw new HtlcError(
			"NotAuthorized",
			`Not authorized: ${caller} cannot ${verb} escrow ${escrow.orderId}`,
			{ orderId: escrow.orderId, owner: escrow.owner, caller },
		);
	}

	/**
	 * Persist the terminal record, then pay `recipient`. If the payment
	 * fails the previous record is put back.
	 */
	private async settle(
		key: string,
		previous: Escrow,
		next: Escrow,
		recipient: AccountId,
	): Promise<void> {
		await this.atomically(async (onRollback) => {
			await this.storage.update(key, next);
			onRollback(() => this.storage.update(key, previous));
			await this.moveAssets(
				() => this.assets.push(previous.asset, recipient, previous.amount),
				{ orderId: previous.orderId, owner: previous.owner },
			);
		}, `settle escrow ${previous.orderId}/${previous.owner}`);
	}

	/**
	 * Run `work` inside the configured transaction. Without one, the steps
	 * `work` registers are run newest first when it throws. A step that
	 * fails is logged and the next one still runs; the caller always sees
	 * the original error.
	 */
	private async atomically<T>(
		work: (onRollback: (step: RollbackStep) => void) => Promise<T>,
		label: string,
	): Promise<T> {
		if (this.transaction) {
			return this.transaction(() => work(() => {}));
		}

		const steps: RollbackStep[] = [];
		try {
			return await work((step) => {
				steps.push(step);
			});
		} catch (err) {
			for (const step of steps.reverse()) {
				try {
					await step();
				} catch (rollbackErr) {
					this.logger.error(
						`Rollback of ${label} failed, state needs manual repair: ${
							rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)
						}`,
						rollbackErr instanceof Error ? rollbackErr.stack : undefined,
					);
				}
			}
			throw err;
		}
	}

	private async moveAssets(
		transfer: () => Promise<void>,
		context: { orderId: string; owner: AccountId },
	): Promise<void> {
		try {
			await transfer();
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			this.logger.warn(
				`Asset transfer for escrow ${context.orderId}/${context.owner} failed: ${message}`,
			);
			throw new HtlcError("AssetTransferFailed", message, {
				...context,
				cause:
					err instanceof AssetTransferError || err instanceof LedgerError
						? err.code
						: undefined,
			});
		}
	}

	private emit(event: EscrowEvent): void {
		if (!this.listener) return;
		try {
			this.listener(event);
		} catch (err) {
			// The transition is already committed; a listener cannot undo it
			this.logger.error(
				`Listener failed on ${event.type}`,
				err instanceof Error ? err.stack : String(err),
			);
		}
	}
}
