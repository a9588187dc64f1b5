import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { HtlcExceptionFilter } from "./common/filters/htlc-exception.filter";

/**
 * Global pipes and filters, shared by the server bootstrap and e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HtlcExceptionFilter());
	app.enableCors();
	return app;
}
