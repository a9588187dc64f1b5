import { Test } from "@nestjs/testing";
import { TypeOrmModule } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { AssetTransferError, CUSTODY_ACCOUNT } from "@htlc-ledger/sdk";
import { AssetsService } from "./assets.service";
import { AssetBalance } from "./asset-balance.entity";
import { TransactionRunner } from "../common/transaction-runner";

describe("AssetsService", () => {
	let service: AssetsService;
	let dataSource: DataSource;

	beforeEach(async () => {
		const moduleRef = await Test.createTestingModule({
			imports: [
				TypeOrmModule.forRoot({
					type: "better-sqlite3",
					database: ":memory:",
					entities: [AssetBalance],
					synchronize: true,
				}),
				TypeOrmModule.forFeature([AssetBalance]),
			],
			providers: [AssetsService, TransactionRunner],
		}).compile();

		service = moduleRef.get(AssetsService);
		dataSource = moduleRef.get(DataSource);
		await service.mint("usdc", "alice", 1_000n);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("should mint and report balances", async () => {
		await expect(service.mint("usdc", "alice", 5n)).resolves.toBe(1_005n);
		expect(await service.balanceOf("usdc", "alice")).toBe(1_005n);
		expect(await service.balanceOf("usdc", "bob")).toBe(0n);
		expect(await service.balanceOf("eur", "alice")).toBe(0n);
	});

	it("should move deposits through custody", async () => {
		await service.pull("usdc", "alice", 300n);
		expect(await service.custodyBalance("usdc")).toBe(300n);
		expect(await service.balanceOf("usdc", CUSTODY_ACCOUNT)).toBe(300n);

		await service.push("usdc", "bob", 300n);
		expect(await service.balanceOf("usdc", "alice")).toBe(700n);
		expect(await service.balanceOf("usdc", "bob")).toBe(300n);
		expect(await service.custodyBalance("usdc")).toBe(0n);
	});

	it("should refuse to overdraw", async () => {
		const failure = service.pull("usdc", "alice", 1_001n);

		await expect(failure).rejects.toBeInstanceOf(AssetTransferError);
		await expect(failure).rejects.toMatchObject({
			code: "INSUFFICIENT_BALANCE",
			message: "Insufficient balance: alice holds 1000 of usdc, needs 1001",
		});
		expect(await service.balanceOf("usdc", "alice")).toBe(1_000n);
		expect(await service.custodyBalance("usdc")).toBe(0n);
	});

	it("should reject non-positive amounts", async () => {
		await expect(service.mint("usdc", "alice", 0n)).rejects.toMatchObject({
			code: "INVALID_AMOUNT",
			message: "Amount must be positive, got 0",
		});
		await expect(service.transfer("usdc", "alice", "bob", -1n)).rejects.toMatchObject({
			code: "INVALID_AMOUNT",
		});
	});

	it("should keep totals when transfers run concurrently", async () => {
		await Promise.all(
			Array.from({ length: 10 }, () => service.transfer("usdc", "alice", "bob", 50n)),
		);

		expect(await service.balanceOf("usdc", "alice")).toBe(500n);
		expect(await service.balanceOf("usdc", "bob")).toBe(500n);
	});

	it("should never take custody as a counterparty", async () => {
		await expect(service.mint("usdc", CUSTODY_ACCOUNT, 5n)).rejects.toMatchObject({
			name: "AssetTransferError",
			code: "CUSTODY_ACCOUNT",
			message: "Account escrow-custody is the escrow custody",
		});
		await expect(service.pull("usdc", CUSTODY_ACCOUNT, 1n)).rejects.toMatchObject({
			code: "CUSTODY_ACCOUNT",
		});
		await expect(service.push("usdc", CUSTODY_ACCOUNT, 1n)).rejects.toMatchObject({
			code: "CUSTODY_ACCOUNT",
		});
		await expect(
			service.transfer("usdc", "alice", CUSTODY_ACCOUNT, 1n),
		).rejects.toMatchObject({ code: "CUSTODY_ACCOUNT" });

		expect(await service.custodyBalance("usdc")).toBe(0n);
		expect(service.isCustody(CUSTODY_ACCOUNT)).toBe(true);
		expect(service.isCustody("alice")).toBe(false);
	});
});
