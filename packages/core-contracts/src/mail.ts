/**
 * Fields extracted from one raw message, before the store assigns an id.
 *
 * Header-derived fields are `undefined` when the header is missing, which is
 * distinct from a header that is present but empty.
 */
export interface NormalizedEmail {
	/** Origin of the raw message (the CSV `file` column) */
	sourcePath: string;
	/** RFC822 Message-ID header */
	messageId?: string;
	/** Raw Date header text */
	sentAt?: string;
	/** From header display text */
	sender?: string;
	/** To header display text */
	recipients?: string;
	/** Decoded Subject header */
	subject?: string;
	/** Best-effort plain-text body, empty when none was found */
	body: string;
}

/**
 * A normalized message as persisted in the store
 */
export interface EmailRecord extends NormalizedEmail {
	/** Store-assigned identity, monotonically increasing */
	id: number;
}

/**
 * One ranked search hit
 */
export interface SearchResult {
	id: number;
	subject: string | null;
	sender: string | null;
	sentAt: string | null;
	sourcePath: string;
	body: string;
	/** Excerpt with matches wrapped in `[` and `]` */
	snippet: string;
	/** Relevance, lower is better */
	score: number;
}

/**
 * Outcome of one ingestion run
 */
export interface IngestSummary {
	rowsImported: number;
	rowsSkipped: number;
	/** True when a row cap or a shutdown signal ended the run */
	stoppedEarly: boolean;
}
