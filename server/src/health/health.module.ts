import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";
import { EscrowsModule } from "../escrows/escrows.module";

@Module({
	imports: [EscrowsModule],
	controllers: [HealthController],
})
export class HealthModule {}
