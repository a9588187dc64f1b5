import { DataSource } from "typeorm";
import { type Escrow, StorageError } from "@htlc-ledger/sdk";
import { EscrowRecord } from "./escrow-record.entity";
import { TypeOrmEscrowStorage } from "./typeorm-escrow-storage";

function escrow(overrides: Partial<Escrow> = {}): Escrow {
	return {
		orderId: "order-1",
		secretHash: "ab".repeat(32),
		owner: "alice",
		taker: "bob",
		asset: "usdc",
		amount: 100n,
		timelock: 5_000,
		status: "active",
		createdAt: 1_000,
		...overrides,
	};
}

describe("TypeOrmEscrowStorage", () => {
	let dataSource: DataSource;
	let storage: TypeOrmEscrowStorage;

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [EscrowRecord],
			synchronize: true,
		});
		await dataSource.initialize();
		storage = new TypeOrmEscrowStorage(dataSource.getRepository(EscrowRecord));
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("should round-trip an escrow, amount beyond 64 bits included", async () => {
		const big = (1n << 200n) + 7n;
		await storage.insert("k1", escrow({ amount: big }));

		expect(await storage.load("k1")).toEqual(escrow({ amount: big }));
		expect(await storage.exists("k1")).toBe(true);
		expect(await storage.count()).toBe(1);
	});

	it("should return null for unknown keys", async () => {
		expect(await storage.load("missing")).toBeNull();
		expect(await storage.exists("missing")).toBe(false);
	});

	it("should refuse a duplicate key", async () => {
		await storage.insert("k1", escrow());

		const failure = storage.insert("k1", escrow({ taker: "carol" }));
		await expect(failure).rejects.toBeInstanceOf(StorageError);
		await expect(failure).rejects.toMatchObject({ code: "DUPLICATE_KEY" });
	});

	it("should update terminal fields and clear them again", async () => {
		await storage.insert("k1", escrow());

		await storage.update("k1", escrow({ status: "completed", completedAt: 2_000 }));
		expect(await storage.load("k1")).toEqual(
			escrow({ status: "completed", completedAt: 2_000 }),
		);

		await storage.update("k1", escrow());
		expect(await storage.load("k1")).toEqual(escrow());
	});

	it("should refuse to update a missing key", async () => {
		await expect(storage.update("k1", escrow())).rejects.toMatchObject({
			code: "NOT_FOUND",
		});
	});

	describe("query", () => {
		beforeEach(async () => {
			await storage.insert("k1", escrow({ orderId: "o1", createdAt: 100 }));
			await storage.insert(
				"k2",
				escrow({
					orderId: "o2",
					owner: "carol",
					createdAt: 200,
					status: "cancelled",
					cancelledAt: 300,
				}),
			);
			await storage.insert(
				"k3",
				escrow({ orderId: "o3", taker: "dave", asset: "eur", createdAt: 200 }),
			);
		});

		it("should list newest first", async () => {
			const result = await storage.query();

			expect(result.items.map((e) => e.orderId)).toEqual(["o3", "o2", "o1"]);
			expect(result.total).toBe(3);
			expect(result.hasMore).toBe(false);
		});

		it("should filter", async () => {
			expect((await storage.query({ owner: "carol" })).items[0]).toEqual(
				escrow({
					orderId: "o2",
					owner: "carol",
					createdAt: 200,
					status: "cancelled",
					cancelledAt: 300,
				}),
			);
			expect((await storage.query({ taker: "dave" })).total).toBe(1);
			expect((await storage.query({ asset: "usdc" })).total).toBe(2);
			expect(
				(await storage.query({ status: ["active"] })).items.map((e) => e.orderId),
			).toEqual(["o3", "o1"]);
		});

		it("should paginate", async () => {
			const page = await storage.query({ limit: 1, offset: 1, sortOrder: "asc" });

			expect(page.items.map((e) => e.orderId)).toEqual(["o2"]);
			expect(page.total).toBe(3);
			expect(page.hasMore).toBe(true);
		});
	});
});
