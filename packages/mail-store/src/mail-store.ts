import type { CompiledQuery, NormalizedEmail } from "@mailsift/core-contracts";

export const MAIL_STORE = "MAIL_STORE";

/**
 * Searchable text of one stored record
 */
export type TextSample = {
	id: number;
	subject: string | null;
	body: string | null;
};

/**
 * One row of a full-text query, joined with its record
 */
export interface MatchRow {
	id: number;
	subject: string | null;
	sender: string | null;
	sentAt: string | null;
	sourcePath: string;
	body: string;
	snippet: string;
	score: number;
}

/**
 * Relational record store paired with a full-text index keyed by record id.
 *
 * Writes accumulate in an open transaction until `commit()`; there is a
 * single writer per store instance. Reads only see committed data.
 */
export interface MailStore {
	/** Idempotent */
	createSchema(): Promise<void>;
	insertRecord(record: NormalizedEmail): Promise<number>;
	insertIndexEntry(
		id: number,
		subject: string | undefined,
		body: string,
	): Promise<void>;
	commit(): Promise<void>;
	/** Up to `limit` records with an id above `afterId`, in id order */
	sampleText(afterId: number, limit: number): Promise<TextSample[]>;
	/** Rows ordered by ascending score, at most `limit` of them */
	query(compiled: CompiledQuery, limit: number): Promise<MatchRow[]>;
	/** Abandons uncommitted writes and releases connections held by this store */
	close(): Promise<void>;
}
