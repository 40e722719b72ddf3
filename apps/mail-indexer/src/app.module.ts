import { DatabaseModule } from "@mailsift/mail-store";
import {
	LifecycleModule,
	ServiceConfigModule,
	TelemetryModule,
} from "@mailsift/service-base";
import { Module } from "@nestjs/common";
import { IndexerModule } from "./indexer/indexer.module.js";

@Module({
	imports: [
		ServiceConfigModule.forRoot({
			envFilePath: ".env",
			serviceName: "mail-indexer",
		}),
		TelemetryModule,
		LifecycleModule.forRoot({ graceful: true }),
		DatabaseModule,
		IndexerModule,
	],
})
export class AppModule {}
