import request from "supertest";
import { Test } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import {
	bytesToHex,
	hashSecret,
	type ManualClock,
	stringToBytes,
} from "@htlc-ledger/sdk";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import { LEDGER_CLOCK } from "../src/escrows/escrow-clock";

export const T0 = 1_700_000_000;

export const ADMIN_ACCOUNT = "admin";
export const ADMIN_USER = "operator";
export const ADMIN_PASS = "test-secret";

export function secretFor(label: string) {
	const bytes = stringToBytes(label);
	return { hex: bytesToHex(bytes), hash: hashSecret(bytes) };
}

/**
 * Boots the full application on an in-memory database, with the ledger
 * reading time from `clock`.
 */
export async function createTestApp(
	clock: ManualClock,
): Promise<INestApplication> {
	process.env.ESCROW_ADMIN_ACCOUNT = ADMIN_ACCOUNT;
	process.env.ADMIN_BASIC_USER = ADMIN_USER;
	process.env.ADMIN_BASIC_PASS = ADMIN_PASS;

	const moduleFixture = await Test.createTestingModule({
		imports: [AppModule],
	})
		.overrideProvider(LEDGER_CLOCK)
		.useValue(clock)
		.compile();

	const app = configureApp(moduleFixture.createNestApplication());
	// One listener for the whole suite; concurrent requests share it
	await app.listen(0);
	return app;
}

export async function mint(
	app: INestApplication,
	asset: string,
	account: string,
	amount: string,
) {
	await request(app.getHttpServer())
		.post(`/api/v1/assets/${asset}/mint`)
		.send({ account, amount })
		.expect(201);
}

export async function balanceOf(
	app: INestApplication,
	asset: string,
	account: string,
): Promise<string> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/assets/${asset}/balances/${account}`)
		.expect(200);
	return res.body.data.balance;
}

export const createEscrowBody = {
	orderId: "order-1",
	taker: "bob",
	asset: "usdc",
	amount: "100",
	timelockDuration: 3600,
};
