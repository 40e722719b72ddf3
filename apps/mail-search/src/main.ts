import "reflect-metadata";
import { LOGGER, type LoggerService, exitCodeFor } from "@mailsift/service-base";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";
import { renderResults } from "./search/render.js";
import { SearchService } from "./search/search.service.js";

async function bootstrap(): Promise<void> {
	const queryText = process.argv.slice(2).join(" ");

	const app = await NestFactory.createApplicationContext(AppModule, {
		bufferLogs: true,
	});
	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);

	try {
		const results = await app.get(SearchService).search(queryText);
		process.stdout.write(renderResults(results));
	} catch (error) {
		logger.critical("Search failed", {
			error_code: "SEARCH_FAILED",
			reason: error instanceof Error ? error.message : String(error),
		});
		process.exitCode = exitCodeFor(error);
	} finally {
		await app.close();
		logger.flush();
	}
}

bootstrap().catch((error: unknown) => {
	console.error("Failed to start mail-search:", error);
	process.exitCode = exitCodeFor(error);
});
