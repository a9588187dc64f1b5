import {
	CanActivate,
	ExecutionContext,
	ForbiddenException,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { CUSTODY_ACCOUNT } from "@htlc-ledger/sdk";

export const ACCOUNT_HEADER = "x-account";

/**
 * Requires the caller to name its account in `X-Account`.
 *
 * The header is an asserted identity: whoever sends it acts as that
 * account. Deployments that need real authentication put it in front of
 * this service. Nobody may act as the escrow custody.
 */
@Injectable()
export class AccountGuard implements CanActivate {
	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<Request>();
		const account = req.header(ACCOUNT_HEADER);
		if (!account || account.trim() === "") {
			throw new UnauthorizedException("Missing X-Account header");
		}
		if (account.trim() === CUSTODY_ACCOUNT) {
			throw new ForbiddenException("The escrow custody cannot act as a caller");
		}
		return true;
	}
}
