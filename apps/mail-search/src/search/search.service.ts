import type { SearchResult } from "@mailsift/core-contracts";
import { isEmptyExpression } from "@mailsift/core-contracts";
import type { MailStore, MatchRow } from "@mailsift/mail-store";
import type { LoggerService, TelemetryService } from "@mailsift/service-base";
import { Injectable } from "@nestjs/common";
import { QueryCompiler } from "../query/query-compiler.js";
import { sampleVocabulary } from "../vocabulary/vocabulary.service.js";

export interface SearchOptions {
	vocabRows: number;
	vocabMaxTokens: number;
	similarityCutoff: number;
	maxCandidates: number;
	/** Used when `search` is called without a limit */
	resultLimit: number;
}

function toResult(row: MatchRow): SearchResult {
	return {
		id: row.id,
		subject: row.subject,
		sender: row.sender,
		sentAt: row.sentAt,
		sourcePath: row.sourcePath,
		body: row.body,
		snippet: row.snippet,
		score: row.score,
	};
}

/**
 * Fuzzy boolean search over the indexed corpus.
 *
 * The vocabulary used for term expansion is sampled once, in `create`, and
 * never refreshed; build a new instance to pick up newly indexed mail.
 */
@Injectable()
export class SearchService {
	private constructor(
		private readonly store: MailStore,
		private readonly compiler: QueryCompiler,
		private readonly telemetry: TelemetryService,
		private readonly logger: LoggerService,
		private readonly resultLimit: number,
	) {}

	static async create(
		store: MailStore,
		telemetry: TelemetryService,
		logger: LoggerService,
		options: SearchOptions,
	): Promise<SearchService> {
		const started = Date.now();
		const vocabulary = await sampleVocabulary(store, {
			maxRows: options.vocabRows,
			maxTokens: options.vocabMaxTokens,
		});
		const duration = Date.now() - started;

		telemetry.gauge("search.vocabulary_size", vocabulary.size);
		logger.debug("Vocabulary loaded", {
			stage: "search",
			vocabulary_size: vocabulary.size,
			duration_ms: duration,
		});

		const compiler = new QueryCompiler(vocabulary, {
			similarityCutoff: options.similarityCutoff,
			maxCandidates: options.maxCandidates,
		});
		return new SearchService(
			store,
			compiler,
			telemetry,
			logger,
			options.resultLimit,
		);
	}

	/**
	 * Ranked hits for `queryText`, best first. Text without any term
	 * returns nothing and never reaches the store.
	 */
	async search(
		queryText: string,
		limit: number = this.resultLimit,
	): Promise<SearchResult[]> {
		const compiled = this.compiler.compile(queryText);
		if (isEmptyExpression(compiled.expression)) {
			this.logger.debug("Query has no terms", { stage: "search" });
			return [];
		}

		return this.telemetry.withSpan(
			"mailsift.search",
			{ groups: String(compiled.expression.groups.length) },
			async () => {
				const started = Date.now();
				const rows = await this.store.query(compiled, limit);
				const duration = Date.now() - started;

				this.telemetry.timing("search.query_ms", duration);
				this.telemetry.increment("search.queries");
				this.logger.debug("Search completed", {
					stage: "search",
					tsquery: compiled.text,
					results: rows.length,
					duration_ms: duration,
				});

				return [...rows].sort((a, b) => a.score - b.score).map(toResult);
			},
		);
	}
}
