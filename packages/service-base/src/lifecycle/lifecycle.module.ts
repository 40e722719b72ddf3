import { type DynamicModule, Global, Module } from "@nestjs/common";
import { LOGGER, type LoggerService } from "../telemetry/logger.service.js";
import { TelemetryService } from "../telemetry/telemetry.service.js";
import { type LifecycleOptions, LifecycleService } from "./lifecycle.service.js";

@Global()
@Module({})
export class LifecycleModule {
	static forRoot(options: LifecycleOptions): DynamicModule {
		return {
			module: LifecycleModule,
			providers: [
				{
					provide: LifecycleService,
					useFactory: (logger: LoggerService, telemetry: TelemetryService) =>
						new LifecycleService(logger, telemetry, options),
					inject: [LOGGER, TelemetryService],
				},
			],
			exports: [LifecycleService],
		};
	}
}
