import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { ManualClock } from "@htlc-ledger/sdk";
import {
	ADMIN_ACCOUNT,
	balanceOf,
	createEscrowBody,
	createTestApp,
	mint,
	secretFor,
	T0,
} from "./utils";

describe("Escrow lifecycle over HTTP", () => {
	let app: INestApplication;
	let clock: ManualClock;
	const secret = secretFor("s3cr3t");

	beforeAll(async () => {
		clock = new ManualClock(T0);
		app = await createTestApp(clock);
		await mint(app, "usdc", "alice", "1000");
	});

	afterAll(async () => {
		await app.close();
	});

	describe("creating", () => {
		it("should require the caller's account", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.send({ ...createEscrowBody, secretHash: secret.hash })
				.expect(401);
			expect(body.message).toBe("Missing X-Account header");
		});

		it("should validate the body", async () => {
			await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: secret.hash, amount: "1e3" })
				.expect(400);
			await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: secret.hash, extra: true })
				.expect(400);
		});

		it("should reject a zero hashlock", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: "00".repeat(32) })
				.expect(400);
			expect(body).toEqual({
				statusCode: 400,
				error: "InvalidHash",
				kind: "InvalidInput",
				message: "Invalid hash: zero digest",
			});
		});

		it("should reject a deposit larger than the balance", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: secret.hash, amount: "5000" })
				.expect(402);
			expect(body.error).toBe("AssetTransferFailed");
			expect(body.message).toBe(
				"Insufficient balance: alice holds 1000 of usdc, needs 5000",
			);
		});

		it("should lock the deposit", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: secret.hash })
				.expect(201);

			expect(body.data).toEqual({
				orderId: "order-1",
				owner: "alice",
				taker: "bob",
				asset: "usdc",
				amount: "100",
				secretHash: secret.hash,
				timelock: T0 + 3600,
				status: "active",
				createdAt: T0,
			});
			expect(await balanceOf(app, "usdc", "alice")).toBe("900");
		});

		it("should refuse the same order twice", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, secretHash: secret.hash })
				.expect(409);
			expect(body.error).toBe("EscrowAlreadyExists");
			expect(body.kind).toBe("Conflict");
		});

		it("should not let anyone act as the escrow custody", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "escrow-custody")
				.send({ ...createEscrowBody, orderId: "order-x", secretHash: secret.hash })
				.expect(403);
			expect(body.message).toBe("The escrow custody cannot act as a caller");

			await request(app.getHttpServer())
				.post("/api/v1/assets/usdc/mint")
				.send({ account: "escrow-custody", amount: "100" })
				.expect(400, {
					statusCode: 400,
					error: "CUSTODY_ACCOUNT",
					message: "Account escrow-custody is the escrow custody",
				});
			expect(await balanceOf(app, "usdc", "escrow-custody")).toBe("100");
		});

		it("should not pay the escrow custody as taker", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({
					...createEscrowBody,
					orderId: "order-x",
					taker: "escrow-custody",
					secretHash: secret.hash,
				})
				.expect(400);
			expect(body.error).toBe("InvalidTaker");
			expect(await balanceOf(app, "usdc", "alice")).toBe("900");
		});
	});

	describe("reading", () => {
		it("should answer the status queries", async () => {
			const server = app.getHttpServer();

			await request(server)
				.get("/api/v1/escrows/order-1/alice/exists")
				.expect(200, { data: { value: true } });
			await request(server)
				.get("/api/v1/escrows/order-1/alice/active")
				.expect(200, { data: { value: true } });
			await request(server)
				.get("/api/v1/escrows/order-1/alice/timelock-expired")
				.expect(200, { data: { value: false } });
			await request(server)
				.get("/api/v1/escrows/order-9/alice/exists")
				.expect(200, { data: { value: false } });
		});

		it("should 404 on unknown escrows", async () => {
			const { body } = await request(app.getHttpServer())
				.get("/api/v1/escrows/order-9/alice/active")
				.expect(404);
			expect(body.error).toBe("EscrowNotFound");
			expect(body.message).toBe("Escrow order-9 not found for owner alice");
		});

		it("should compute hashlocks", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/hash")
				.send({ data: secret.hex })
				.expect(200);
			expect(body.data.hash).toBe(secret.hash);
		});
	});

	describe("revealing", () => {
		it("should only accept the taker", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-1/alice/reveal")
				.set("X-Account", "alice")
				.send({ secret: secret.hex })
				.expect(403);
			expect(body.error).toBe("NotAuthorized");
		});

		it("should reject the wrong secret", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-1/alice/reveal")
				.set("X-Account", "bob")
				.send({ secret: secretFor("guess").hex })
				.expect(422);
			expect(body.error).toBe("HashMismatch");
		});

		it("should not let the owner cancel early", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-1/alice/cancel")
				.set("X-Account", "alice")
				.expect(422);
			expect(body.error).toBe("TimelockNotExpired");
		});

		it("should pay the taker", async () => {
			clock.advance(10);

			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-1/alice/reveal")
				.set("X-Account", "bob")
				.send({ secret: secret.hex })
				.expect(200);

			expect(body.data).toEqual({
				orderId: "order-1",
				owner: "alice",
				status: "completed",
				amount: "100",
				recipient: "bob",
			});
			expect(await balanceOf(app, "usdc", "bob")).toBe("100");
		});

		it("should succeed only once", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-1/alice/reveal")
				.set("X-Account", "bob")
				.send({ secret: secret.hex })
				.expect(409);
			expect(body.error).toBe("EscrowNotActive");
		});
	});

	describe("cancelling", () => {
		const refund = secretFor("refund-me");

		beforeAll(async () => {
			await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({
					...createEscrowBody,
					orderId: "order-2",
					secretHash: refund.hash,
					timelockDuration: 60,
				})
				.expect(201);
			clock.advance(60);
		});

		it("should refuse the secret at the timelock", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-2/alice/reveal")
				.set("X-Account", "bob")
				.send({ secret: refund.hex })
				.expect(422);
			expect(body.error).toBe("TimelockExpired");
		});

		it("should only let the owner cancel", async () => {
			await request(app.getHttpServer())
				.post("/api/v1/escrows/order-2/alice/cancel")
				.set("X-Account", "bob")
				.expect(403);
		});

		it("should refund the owner", async () => {
			const { body } = await request(app.getHttpServer())
				.post("/api/v1/escrows/order-2/alice/cancel")
				.set("X-Account", "alice")
				.expect(200);

			expect(body.data).toEqual({
				orderId: "order-2",
				owner: "alice",
				status: "cancelled",
				amount: "100",
				recipient: "alice",
			});
			expect(await balanceOf(app, "usdc", "alice")).toBe("900");
		});
	});

	describe("racing", () => {
		const race = secretFor("race");

		beforeAll(async () => {
			await request(app.getHttpServer())
				.post("/api/v1/escrows")
				.set("X-Account", "alice")
				.send({ ...createEscrowBody, orderId: "order-3", secretHash: race.hash })
				.expect(201);
		});

		it("should settle concurrent reveals exactly once", async () => {
			const server = app.getHttpServer();
			const send = () =>
				request(server)
					.post("/api/v1/escrows/order-3/alice/reveal")
					.set("X-Account", "bob")
					.send({ secret: race.hex });

			const responses = await Promise.all([send(), send(), send()]);

			expect(responses.map((r) => r.status).sort()).toEqual([200, 409, 409]);
			expect(await balanceOf(app, "usdc", "bob")).toBe("200");
		});
	});

	describe("listing", () => {
		it("should page through escrows newest first", async () => {
			const { body } = await request(app.getHttpServer())
				.get("/api/v1/escrows")
				.query({ owner: "alice", limit: 2 })
				.expect(200);

			expect(body.data.map((e: { orderId: string }) => e.orderId)).toEqual([
				"order-3",
				"order-2",
			]);
			expect(body.meta).toEqual({ total: 3, offset: 0, hasMore: true });
		});

		it("should filter by status", async () => {
			const { body } = await request(app.getHttpServer())
				.get("/api/v1/escrows")
				.query({ status: "cancelled" })
				.expect(200);

			expect(body.data.map((e: { orderId: string }) => e.orderId)).toEqual([
				"order-2",
			]);
		});

		it("should reject unknown statuses", async () => {
			await request(app.getHttpServer())
				.get("/api/v1/escrows")
				.query({ status: "pending" })
				.expect(400);
		});

		it("should report stats", async () => {
			const { body } = await request(app.getHttpServer())
				.get("/api/v1/escrows/stats")
				.expect(200);

			expect(body.data).toEqual({
				escrowCount: 3,
				administrator: ADMIN_ACCOUNT,
				currentTimestamp: T0 + 70,
			});
		});
	});
});
