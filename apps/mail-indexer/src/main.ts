import "reflect-metadata";
import { MissingEnvVarError } from "@mailsift/core-config";
import { MAIL_STORE, type MailStore } from "@mailsift/mail-store";
import {
	LOGGER,
	type LoggerService,
	SERVICE_CONFIG,
	type ServiceConfig,
	exitCodeFor,
} from "@mailsift/service-base";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module.js";
import { CorpusIndexerService } from "./indexer/indexer.service.js";
import { inspectRows } from "./indexer/inspect.js";
import { openCsvSource } from "./source/csv-source.js";

type Command = "index" | "inspect";

function parseCommand(arg: string | undefined): Command {
	if (arg === undefined || arg === "index") return "index";
	if (arg === "inspect") return "inspect";
	throw new Error(`Unknown command "${arg}", expected index or inspect`);
}

async function bootstrap(): Promise<void> {
	const command = parseCommand(process.argv[2]);

	const app = await NestFactory.createApplicationContext(AppModule, {
		bufferLogs: true,
	});
	const logger = app.get<LoggerService>(LOGGER);
	app.useLogger(logger);

	try {
		const config = app.get<ServiceConfig>(SERVICE_CONFIG);
		const csvPath = process.argv[3] ?? config.ingest.csvPath;
		if (csvPath === undefined) {
			throw new MissingEnvVarError(
				"INGEST_CSV_PATH",
				"CSV export with file and message columns",
			);
		}
		const source = openCsvSource(csvPath, {
			maxFieldSize: config.ingest.maxFieldSize,
		});

		if (command === "inspect") {
			for (const line of await inspectRows(source)) {
				process.stdout.write(`${line}\n`);
			}
			return;
		}

		await app.get<MailStore>(MAIL_STORE).createSchema();
		logger.lifecycle("Indexing started", { source_path: csvPath });

		const summary = await app
			.get(CorpusIndexerService)
			.buildIndex(source, { rowLimit: config.ingest.rowLimit });
		logger.operational(
			`Imported ${summary.rowsImported} rows, skipped ${summary.rowsSkipped}`,
			{ stopped_early: summary.stoppedEarly },
		);
	} catch (error) {
		logger.critical("Indexing failed", {
			error_code: "INDEX_FAILED",
			reason: error instanceof Error ? error.message : String(error),
		});
		process.exitCode = exitCodeFor(error);
	} finally {
		await app.close();
		logger.flush();
	}
}

bootstrap().catch((error: unknown) => {
	console.error("Failed to start mail-indexer:", error);
	process.exitCode = exitCodeFor(error);
});
