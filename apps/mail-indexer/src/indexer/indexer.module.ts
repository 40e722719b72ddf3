import { MAIL_STORE, type MailStore } from "@mailsift/mail-store";
import {
	LOGGER,
	LifecycleService,
	type LoggerService,
	SERVICE_CONFIG,
	type ServiceConfig,
	TelemetryService,
} from "@mailsift/service-base";
import { Module } from "@nestjs/common";
import { NormalizerService } from "../normalizer/normalizer.service.js";
import { CorpusIndexerService } from "./indexer.service.js";

@Module({
	providers: [
		{
			provide: NormalizerService,
			useFactory: (logger: LoggerService) =>
				new NormalizerService(logger.child({ component: "normalizer" })),
			inject: [LOGGER],
		},
		{
			provide: CorpusIndexerService,
			useFactory: (
				store: MailStore,
				normalizer: NormalizerService,
				lifecycle: LifecycleService,
				telemetry: TelemetryService,
				logger: LoggerService,
				config: ServiceConfig,
			) =>
				new CorpusIndexerService(
					store,
					normalizer,
					lifecycle,
					telemetry,
					logger,
					{ batchSize: config.ingest.batchSize },
				),
			inject: [
				MAIL_STORE,
				NormalizerService,
				LifecycleService,
				TelemetryService,
				LOGGER,
				SERVICE_CONFIG,
			],
		},
	],
	exports: [CorpusIndexerService],
})
export class IndexerModule {}
