import { DatabaseModule } from "@mailsift/mail-store";
import {
	LifecycleModule,
	ServiceConfigModule,
	TelemetryModule,
} from "@mailsift/service-base";
import { Module } from "@nestjs/common";
import { SearchModule } from "./search/search.module.js";

@Module({
	imports: [
		ServiceConfigModule.forRoot({
			envFilePath: ".env",
			serviceName: "mail-search",
		}),
		TelemetryModule,
		// Searches never poll the shutdown flag
		LifecycleModule.forRoot({ graceful: false }),
		DatabaseModule,
		SearchModule,
	],
})
export class AppModule {}
