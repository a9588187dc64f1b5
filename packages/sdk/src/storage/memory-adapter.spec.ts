import { MemoryEscrowStorage } from "./memory-adapter.js";
import { StorageError } from "./types.js";
import type { Escrow } from "../modules/htlc/types.js";

function escrow(overrides: Partial<Escrow> = {}): Escrow {
	return {
		orderId: "order-1",
		secretHash: "ab".repeat(32),
		owner: "alice",
		taker: "bob",
		asset: "usdc",
		amount: 100n,
		timelock: 1_000,
		status: "active",
		createdAt: 100,
		...overrides,
	};
}

describe("MemoryEscrowStorage", () => {
	let storage: MemoryEscrowStorage;

	beforeEach(() => {
		storage = new MemoryEscrowStorage();
	});

	it("should insert and load copies", async () => {
		const record = escrow();
		await storage.insert("k1", record);
		record.status = "completed";

		const loaded = await storage.load("k1");
		expect(loaded?.status).toBe("active");
		if (loaded) loaded.amount = 1n;
		expect((await storage.load("k1"))?.amount).toBe(100n);
	});

	it("should return null for unknown keys", async () => {
		expect(await storage.load("missing")).toBeNull();
		expect(await storage.exists("missing")).toBe(false);
	});

	it("should refuse duplicate inserts", async () => {
		await storage.insert("k1", escrow());

		const failure = storage.insert("k1", escrow({ amount: 5n }));
		await expect(failure).rejects.toBeInstanceOf(StorageError);
		await expect(failure).rejects.toMatchObject({ code: "DUPLICATE_KEY" });
		expect((await storage.load("k1"))?.amount).toBe(100n);
	});

	it("should update only existing records", async () => {
		await expect(storage.update("k1", escrow())).rejects.toMatchObject({
			code: "NOT_FOUND",
		});

		await storage.insert("k1", escrow());
		await storage.update("k1", escrow({ status: "cancelled", cancelledAt: 2_000 }));
		expect(await storage.load("k1")).toMatchObject({
			status: "cancelled",
			cancelledAt: 2_000,
		});
	});

	describe("query", () => {
		beforeEach(async () => {
			await storage.insert("k1", escrow({ orderId: "o1", createdAt: 100 }));
			await storage.insert(
				"k2",
				escrow({ orderId: "o2", owner: "carol", createdAt: 200, status: "completed" }),
			);
			await storage.insert(
				"k3",
				escrow({ orderId: "o3", taker: "dave", asset: "eur", createdAt: 200 }),
			);
		});

		it("should list newest first, later inserts first on ties", async () => {
			const result = await storage.query();

			expect(result.items.map((e) => e.orderId)).toEqual(["o3", "o2", "o1"]);
			expect(result.total).toBe(3);
			expect(result.hasMore).toBe(false);
			expect(await storage.count()).toBe(3);
		});

		it("should sort oldest first on request", async () => {
			const result = await storage.query({ sortOrder: "asc" });

			expect(result.items.map((e) => e.orderId)).toEqual(["o1", "o2", "o3"]);
		});

		it("should filter by party, asset and status", async () => {
			expect((await storage.query({ owner: "carol" })).items.map((e) => e.orderId))
				.toEqual(["o2"]);
			expect((await storage.query({ taker: "dave" })).items.map((e) => e.orderId))
				.toEqual(["o3"]);
			expect((await storage.query({ asset: "usdc" })).total).toBe(2);
			expect((await storage.query({ status: "active" })).total).toBe(2);
			expect(
				(await storage.query({ status: ["completed", "cancelled"] })).items.map(
					(e) => e.orderId,
				),
			).toEqual(["o2"]);
		});

		it("should paginate", async () => {
			const page = await storage.query({ limit: 2, offset: 1 });

			expect(page.items.map((e) => e.orderId)).toEqual(["o2", "o1"]);
			expect(page.total).toBe(3);
			expect(page.hasMore).toBe(false);

			const first = await storage.query({ limit: 1 });
			expect(first.hasMore).toBe(true);
		});
	});

	it("should clear everything", async () => {
		await storage.insert("k1", escrow());
		storage.clear();

		expect(await storage.count()).toBe(0);
	});
});
