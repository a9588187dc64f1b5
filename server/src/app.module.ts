import { ConfigModule, ConfigService } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { HealthModule } from "./health/health.module";
import { EscrowsModule } from "./escrows/escrows.module";
import { AssetsModule } from "./assets/assets.module";
import { AdminModule } from "./admin/admin.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { BasicAuthMiddleware } from "./auth/basic-auth.middleware";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				type: "better-sqlite3",
				database:
					config.get<string>("NODE_ENV") === "test"
						? ":memory:"
						: config.get<string>("SQLITE_DB_PATH", "htlc-ledger.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		EscrowsModule,
		AssetsModule,
		AdminModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/v1/admin/*", method: RequestMethod.ALL });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
