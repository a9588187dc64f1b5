import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	AssetTransferError,
	type HtlcErrorKind,
	isHtlcError,
} from "@htlc-ledger/sdk";
import { toError } from "../errors";

export const STATUS_BY_KIND: Record<HtlcErrorKind, HttpStatus> = {
	InvalidInput: HttpStatus.BAD_REQUEST,
	Conflict: HttpStatus.CONFLICT,
	NotFound: HttpStatus.NOT_FOUND,
	NotActive: HttpStatus.CONFLICT,
	Unauthorized: HttpStatus.FORBIDDEN,
	TimingViolation: HttpStatus.UNPROCESSABLE_ENTITY,
	HashMismatch: HttpStatus.UNPROCESSABLE_ENTITY,
	TransferFailed: HttpStatus.PAYMENT_REQUIRED,
};

/**
 * Renders ledger errors as `{ statusCode, error, kind, message }` and lets
 * Nest HTTP exceptions through unchanged. Anything else is a 500.
 */
@Catch()
export class HtlcExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HtlcExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();

		if (isHtlcError(exception)) {
			const statusCode = STATUS_BY_KIND[exception.kind];
			res.status(statusCode).json({
				statusCode,
				error: exception.code,
				kind: exception.kind,
				message: exception.message,
			});
			return;
		}

		// Raised directly by the asset ledger (minting), outside any escrow
		if (exception instanceof AssetTransferError) {
			const statusCode = HttpStatus.BAD_REQUEST;
			res.status(statusCode).json({
				statusCode,
				error: exception.code ?? "AssetTransferError",
				message: exception.message,
			});
			return;
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const body = exception.getResponse();
			res
				.status(statusCode)
				.json(
					typeof body === "string" ? { statusCode, message: body } : body,
				);
			return;
		}

		const error = toError(exception);
		this.logger.error(`Unhandled error: ${error.message}`, error.stack);
		res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			message: "Internal server error",
		});
	}
}
