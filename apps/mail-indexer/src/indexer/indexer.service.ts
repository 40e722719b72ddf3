import type { IngestSummary } from "@mailsift/core-contracts";
import type { MailStore } from "@mailsift/mail-store";
import type { LoggerService, TelemetryService } from "@mailsift/service-base";
import { Injectable } from "@nestjs/common";
import type { NormalizerService } from "../normalizer/normalizer.service.js";
import type { SourceItem } from "../source/source.types.js";

/**
 * Anything that can ask a running ingestion to stop after the current row
 */
export interface ShutdownMonitor {
	isShutdownInProgress(): boolean;
}

export interface CorpusIndexerOptions {
	/** Successful insertions per transaction */
	batchSize: number;
}

export interface BuildIndexOptions {
	/** Stop after this many insertions; 0 or absent means no cap */
	rowLimit?: number;
}

@Injectable()
export class CorpusIndexerService {
	constructor(
		private readonly store: MailStore,
		private readonly normalizer: NormalizerService,
		private readonly shutdown: ShutdownMonitor,
		private readonly telemetry: TelemetryService,
		private readonly logger: LoggerService,
		private readonly options: CorpusIndexerOptions,
	) {}

	/**
	 * Normalize and store every row of `source`, committing in batches.
	 * Store failures propagate; rows inserted since the last commit are lost.
	 */
	async buildIndex(
		source: AsyncIterable<SourceItem>,
		options: BuildIndexOptions = {},
	): Promise<IngestSummary> {
		const rowLimit = options.rowLimit ?? 0;
		const summary: IngestSummary = {
			rowsImported: 0,
			rowsSkipped: 0,
			stoppedEarly: false,
		};
		const started = Date.now();
		let pending = 0;

		for await (const item of source) {
			if (item.kind === "oversized") {
				summary.rowsSkipped++;
				this.logger.warn("Skipping oversized row", {
					stage: "ingest",
					row: item.row,
					size: item.size,
					error_code: "ROW_OVERSIZED",
				});
				this.telemetry.increment("ingest.rows_skipped", 1, {
					reason: "oversized",
				});
			} else {
				const record = await this.normalizer.normalize(
					item.sourcePath,
					item.rawMessage,
				);
				const id = await this.store.insertRecord(record);
				await this.store.insertIndexEntry(id, record.subject, record.body);
				summary.rowsImported++;
				pending++;

				if (pending >= this.options.batchSize) {
					await this.commit(summary.rowsImported);
					pending = 0;
				}
			}

			if (rowLimit > 0 && summary.rowsImported >= rowLimit) {
				summary.stoppedEarly = true;
				break;
			}
			if (this.shutdown.isShutdownInProgress()) {
				summary.stoppedEarly = true;
				this.logger.lifecycle("Stopping ingestion on shutdown request", {
					rows_imported: summary.rowsImported,
				});
				break;
			}
		}

		if (pending > 0) {
			await this.commit(summary.rowsImported);
		}

		this.telemetry.timing("ingest.duration_ms", Date.now() - started);
		this.logger.operational("Ingestion finished", {
			stage: "ingest",
			rows_imported: summary.rowsImported,
			rows_skipped: summary.rowsSkipped,
			stopped_early: summary.stoppedEarly,
			duration_ms: Date.now() - started,
		});
		return summary;
	}

	private async commit(rowsImported: number): Promise<void> {
		await this.store.commit();
		this.telemetry.gauge("ingest.rows_imported", rowsImported);
		this.logger.info(`Imported ${rowsImported} rows`, { stage: "ingest" });
	}
}
