import {
	LOGGER,
	type LoggerService,
	SERVICE_CONFIG,
	type ServiceConfig,
} from "@mailsift/service-base";
import { Global, Inject, Module, type OnModuleDestroy } from "@nestjs/common";
import pg from "pg";
import { MAIL_STORE } from "./mail-store.js";
import { PostgresMailStore } from "./postgres/postgres-mail.store.js";

const { Pool } = pg;

export const DB_POOL = "DB_POOL";

export function createPool(config: ServiceConfig): pg.Pool {
	const { postgres } = config;

	if (postgres.databaseUrl) {
		return new Pool({
			connectionString: postgres.databaseUrl,
			min: postgres.poolMin,
			max: postgres.poolMax,
			connectionTimeoutMillis: postgres.connectionTimeout,
			idleTimeoutMillis: 30000,
		});
	}

	return new Pool({
		host: postgres.host,
		port: postgres.port,
		database: postgres.database,
		user: postgres.user,
		...(postgres.password !== undefined && { password: postgres.password }),
		ssl: postgres.ssl,
		min: postgres.poolMin,
		max: postgres.poolMax,
		connectionTimeoutMillis: postgres.connectionTimeout,
		idleTimeoutMillis: 30000,
	});
}

@Global()
@Module({
	providers: [
		{
			provide: DB_POOL,
			useFactory: createPool,
			inject: [SERVICE_CONFIG],
		},
		{
			provide: MAIL_STORE,
			useFactory: (
				pool: pg.Pool,
				logger: LoggerService,
				config: ServiceConfig,
			) =>
				new PostgresMailStore(pool, logger, {
					words: config.search.snippetWords,
					fragments: config.search.snippetFragments,
				}),
			inject: [DB_POOL, LOGGER, SERVICE_CONFIG],
		},
	],
	exports: [DB_POOL, MAIL_STORE],
})
export class DatabaseModule implements OnModuleDestroy {
	constructor(
		@Inject(DB_POOL) private readonly pool: pg.Pool,
		@Inject(MAIL_STORE) private readonly store: PostgresMailStore,
		@Inject(LOGGER) private readonly logger: LoggerService,
	) {}

	async onModuleDestroy(): Promise<void> {
		await this.store.close();
		this.logger.lifecycle("Closing database pool");
		await this.pool.end();
	}
}
