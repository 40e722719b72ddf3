import { Global, Module } from "@nestjs/common";
import {
	SERVICE_CONFIG,
	type ServiceConfig,
} from "../config/config.module.js";
import { LOGGER, LoggerService } from "./logger.service.js";
import { TelemetryService } from "./telemetry.service.js";

@Global()
@Module({
	providers: [
		{
			provide: TelemetryService,
			useFactory: (config: ServiceConfig) => {
				const service = new TelemetryService();
				service.initialize(config.datadog);
				return service;
			},
			inject: [SERVICE_CONFIG],
		},
		{
			provide: LOGGER,
			useFactory: (config: ServiceConfig) => new LoggerService(config),
			inject: [SERVICE_CONFIG],
		},
	],
	exports: [TelemetryService, LOGGER],
})
export class TelemetryModule {}
