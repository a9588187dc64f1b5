import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { ACCOUNT_HEADER } from "./account.guard";

export const CallerAccount = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<Request>();
		const account = req.header(ACCOUNT_HEADER)?.trim();
		if (!account) {
			throw new UnauthorizedException("Missing X-Account header");
		}
		return account;
	},
);
