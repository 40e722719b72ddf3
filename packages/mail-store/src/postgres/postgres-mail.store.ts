import type { CompiledQuery, NormalizedEmail } from "@mailsift/core-contracts";
import type { LoggerService } from "@mailsift/service-base";
import type pg from "pg";
import type { MailStore, MatchRow, TextSample } from "../mail-store.js";
import { toStoreError } from "../store.errors.js";
import {
	type HeadlineOptions,
	INSERT_EMAIL_SQL,
	INSERT_FTS_SQL,
	MATCH_SQL,
	SAMPLE_TEXT_SQL,
	SCHEMA_SQL,
	headlineOptions,
} from "./schema.js";

type MatchDbRow = {
	id: number;
	subject: string | null;
	sender: string | null;
	sent_at: string | null;
	source_path: string;
	body: string;
	snippet: string;
	score: number;
};

/**
 * MailStore on PostgreSQL full-text search.
 *
 * Writes go through one dedicated client so the open batch is a single
 * transaction; reads use the pool.
 */
export class PostgresMailStore implements MailStore {
	private writer: pg.PoolClient | null = null;
	private inTransaction = false;
	private readonly headline: string;

	constructor(
		private readonly pool: pg.Pool,
		private readonly logger: LoggerService,
		headline: HeadlineOptions,
	) {
		this.headline = headlineOptions(headline);
	}

	async createSchema(): Promise<void> {
		await this.guard(() => this.pool.query(SCHEMA_SQL));
		this.logger.lifecycle("Mail store schema ready");
	}

	async insertRecord(record: NormalizedEmail): Promise<number> {
		const client = await this.writeClient();
		const result = await this.guard(() =>
			client.query<{ id: number }>(INSERT_EMAIL_SQL, [
				record.sourcePath,
				record.messageId ?? null,
				record.sentAt ?? null,
				record.sender ?? null,
				record.recipients ?? null,
				record.subject ?? null,
				record.body,
			]),
		);

		const id = result.rows[0]?.id;
		if (id === undefined) {
			throw new Error("Failed to insert email - no ID returned");
		}
		return id;
	}

	async insertIndexEntry(
		id: number,
		subject: string | undefined,
		body: string,
	): Promise<void> {
		const client = await this.writeClient();
		await this.guard(() =>
			client.query(INSERT_FTS_SQL, [id, subject ?? null, body]),
		);
	}

	async commit(): Promise<void> {
		if (!this.writer || !this.inTransaction) {
			return;
		}
		const client = this.writer;
		await this.guard(() => client.query("COMMIT"));
		this.inTransaction = false;
	}

	async sampleText(afterId: number, limit: number): Promise<TextSample[]> {
		const result = await this.guard(() =>
			this.pool.query<TextSample>(SAMPLE_TEXT_SQL, [afterId, limit]),
		);
		return result.rows;
	}

	async query(compiled: CompiledQuery, limit: number): Promise<MatchRow[]> {
		const result = await this.guard(() =>
			this.pool.query<MatchDbRow>(MATCH_SQL, [
				compiled.text,
				limit,
				this.headline,
			]),
		);

		return result.rows.map((row) => ({
			id: row.id,
			subject: row.subject,
			sender: row.sender,
			sentAt: row.sent_at,
			sourcePath: row.source_path,
			body: row.body,
			snippet: row.snippet,
			score: row.score,
		}));
	}

	async close(): Promise<void> {
		const client = this.writer;
		if (!client) {
			return;
		}

		this.writer = null;
		try {
			if (this.inTransaction) {
				this.logger.warn("Rolling back uncommitted batch");
				await client.query("ROLLBACK");
			}
			client.release();
		} catch (error) {
			// Destroy the connection instead of returning it to the pool
			client.release(error instanceof Error ? error : true);
			throw toStoreError(error);
		} finally {
			this.inTransaction = false;
		}
	}

	private async writeClient(): Promise<pg.PoolClient> {
		if (!this.writer) {
			this.writer = await this.guard(() => this.pool.connect());
		}
		if (!this.inTransaction) {
			const client = this.writer;
			await this.guard(() => client.query("BEGIN"));
			this.inTransaction = true;
		}
		return this.writer;
	}

	private async guard<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await operation();
		} catch (error) {
			throw toStoreError(error);
		}
	}
}
