import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AssetBalance } from "./asset-balance.entity";
import { AssetsService } from "./assets.service";
import { AssetsController } from "./assets.controller";
import { TransactionRunner } from "../common/transaction-runner";

@Module({
	imports: [TypeOrmModule.forFeature([AssetBalance])],
	providers: [AssetsService, TransactionRunner],
	controllers: [AssetsController],
	exports: [AssetsService, TransactionRunner],
})
export class AssetsModule {}
