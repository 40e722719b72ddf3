import { type FullConfig, loadConfig } from "@mailsift/core-config";
import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { type LoggingConfig, loggingConfigFor } from "../telemetry/log-tier.js";

/**
 * Validated configuration shared by every mailsift process
 */
export interface ServiceConfig extends FullConfig {
	logging: LoggingConfig;
}

export const SERVICE_CONFIG = "SERVICE_CONFIG";

export interface ServiceConfigOptions {
	envFilePath?: string;
	/** Used when SERVICE_NAME is not set */
	serviceName: string;
}

export function createServiceConfig(
	options: ServiceConfigOptions,
	env: Record<string, string | undefined> = process.env,
): ServiceConfig {
	const config = loadConfig({ env, defaultServiceName: options.serviceName });
	return {
		...config,
		logging: loggingConfigFor(config.base.env, config.base.logLevel),
	};
}

@Global()
@Module({})
export class ServiceConfigModule {
	static forRoot(options: ServiceConfigOptions): DynamicModule {
		return {
			module: ServiceConfigModule,
			imports: [
				// Loads .env into process.env before the factory below reads it
				ConfigModule.forRoot({
					...(options.envFilePath ? { envFilePath: options.envFilePath } : {}),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: SERVICE_CONFIG,
					useFactory: () => createServiceConfig(options),
				},
			],
			exports: [SERVICE_CONFIG],
		};
	}
}
