import { Module } from "@nestjs/common";
import { EscrowsModule } from "../escrows/escrows.module";
import { AdminController } from "./admin.controller";

@Module({
	imports: [EscrowsModule],
	controllers: [AdminController],
})
export class AdminModule {}
