import { Controller, Get } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";
import { EscrowsService } from "../escrows/escrows.service";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
		private readonly escrowsService: EscrowsService,
	) {}

	@Get()
	@ApiOperation({ summary: "Database status and ledger clock" })
	@ApiOkResponse({
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				database: { type: "string", enum: ["up", "down"] },
				ledgerTime: {
					type: "number",
					description: "Unix seconds as seen by timelock checks",
				},
				environment: { type: "string", example: "production" },
			},
		},
	})
	check() {
		const databaseUp = this.dataSource.isInitialized;
		return {
			status: databaseUp ? "ok" : "degraded",
			database: databaseUp ? "up" : "down",
			ledgerTime: this.escrowsService.now(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
		};
	}
}
