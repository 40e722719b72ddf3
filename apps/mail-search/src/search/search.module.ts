import { MAIL_STORE, type MailStore } from "@mailsift/mail-store";
import {
	LOGGER,
	type LoggerService,
	SERVICE_CONFIG,
	type ServiceConfig,
	TelemetryService,
} from "@mailsift/service-base";
import { Module } from "@nestjs/common";
import { SearchService } from "./search.service.js";

@Module({
	providers: [
		{
			provide: SearchService,
			useFactory: (
				store: MailStore,
				telemetry: TelemetryService,
				logger: LoggerService,
				config: ServiceConfig,
			) =>
				SearchService.create(store, telemetry, logger, {
					vocabRows: config.search.vocabRows,
					vocabMaxTokens: config.search.vocabMaxTokens,
					similarityCutoff: config.search.similarityCutoff,
					maxCandidates: config.search.maxCandidates,
					resultLimit: config.search.resultLimit,
				}),
			inject: [MAIL_STORE, TelemetryService, LOGGER, SERVICE_CONFIG],
		},
	],
	exports: [SearchService],
})
export class SearchModule {}
