import { Injectable, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { ConfigService } from "@nestjs/config";
import { sha256 } from "@noble/hashes/sha2";
import { bytesEqual, stringToBytes } from "@htlc-ledger/sdk";

const CHALLENGE = 'Basic realm="Restricted"';

type Credentials = { user: string; pass: string };

/**
 * HTTP Basic auth in front of the admin routes, checked against
 * ADMIN_BASIC_USER / ADMIN_BASIC_PASS. With either unset every request
 * is refused.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const expected = this.expectedCredentials();
		if (!expected) {
			return res.status(401).send("Admin access is not configured");
		}

		const given = parseBasicAuthorization(req.header("authorization"));
		if (!given) {
			res.setHeader("WWW-Authenticate", CHALLENGE);
			return res.status(401).send("Authentication required");
		}

		// Evaluate both so a wrong user costs the same as a wrong password
		const userOk = sameSecret(given.user, expected.user);
		const passOk = sameSecret(given.pass, expected.pass);
		if (!(userOk && passOk)) {
			res.setHeader("WWW-Authenticate", CHALLENGE);
			return res.status(401).send("Unauthorized");
		}

		return next();
	}

	private expectedCredentials(): Credentials | undefined {
		const user = this.config.get<string>("ADMIN_BASIC_USER");
		const pass = this.config.get<string>("ADMIN_BASIC_PASS");
		return user && pass ? { user, pass } : undefined;
	}
}

export function parseBasicAuthorization(
	header: string | undefined,
): Credentials | undefined {
	const match = header?.match(/^Basic\s+(\S+)\s*$/);
	if (!match) return undefined;
	const decoded = Buffer.from(match[1], "base64").toString("utf8");
	const sep = decoded.indexOf(":");
	if (sep < 0) return { user: "", pass: "" };
	return { user: decoded.slice(0, sep), pass: decoded.slice(sep + 1) };
}

// Digests have a fixed length, so the comparison time does not reveal it
function sameSecret(given: string, expected: string): boolean {
	return bytesEqual(
		sha256(stringToBytes(given)),
		sha256(stringToBytes(expected)),
	);
}
