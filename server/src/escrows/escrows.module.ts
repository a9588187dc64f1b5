import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { EscrowRecord } from "./escrow-record.entity";
import { EscrowsService } from "./escrows.service";
import { EscrowsController } from "./escrows.controller";
import { ledgerClockProvider } from "./escrow-clock";
import { AssetsModule } from "../assets/assets.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";

@Module({
	imports: [TypeOrmModule.forFeature([EscrowRecord]), AssetsModule],
	providers: [EscrowsService, ServerSentEventsService, ledgerClockProvider],
	controllers: [EscrowsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}
