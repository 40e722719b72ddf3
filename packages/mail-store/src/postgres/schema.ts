/**
 * Record table plus a full-text table keyed by the same id.
 * `document` is derived from subject (weight A) and body (weight B).
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS emails (
	id INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
	source_path TEXT NOT NULL,
	message_id TEXT,
	sent_at TEXT,
	sender TEXT,
	recipients TEXT,
	subject TEXT,
	body TEXT NOT NULL DEFAULT ''
);

CREATE TABLE IF NOT EXISTS email_fts (
	email_id INTEGER PRIMARY KEY REFERENCES emails (id),
	subject TEXT,
	body TEXT,
	document TSVECTOR GENERATED ALWAYS AS (
		setweight(to_tsvector('simple', coalesce(subject, '')), 'A') ||
		setweight(to_tsvector('simple', coalesce(body, '')), 'B')
	) STORED
);

CREATE INDEX IF NOT EXISTS email_fts_document_idx
	ON email_fts USING GIN (document);
`;

export const INSERT_EMAIL_SQL = `INSERT INTO emails (
	source_path, message_id, sent_at, sender, recipients, subject, body
) VALUES ($1, $2, $3, $4, $5, $6, $7)
RETURNING id`;

export const INSERT_FTS_SQL =
	"INSERT INTO email_fts (email_id, subject, body) VALUES ($1, $2, $3)";

export const SAMPLE_TEXT_SQL =
	"SELECT id, subject, body FROM emails WHERE id > $1 ORDER BY id LIMIT $2";

export const MATCH_SQL = `SELECT
	e.id,
	e.subject,
	e.sender,
	e.sent_at,
	e.source_path,
	e.body,
	ts_headline('simple', concat_ws(' ', f.subject, f.body), q.query, $3) AS snippet,
	-ts_rank(f.document, q.query) AS score
FROM email_fts f
CROSS JOIN to_tsquery('simple', $1) AS q (query)
JOIN emails e ON e.id = f.email_id
WHERE f.document @@ q.query
ORDER BY score, e.id
LIMIT $2`;

export interface HeadlineOptions {
	/** Words of context per fragment */
	words: number;
	fragments: number;
}

/**
 * `ts_headline` option string: `[`/`]` markers, fragments joined by ` ... `
 */
export function headlineOptions({ words, fragments }: HeadlineOptions): string {
	// MinWords must stay below MaxWords
	const minWords = Math.max(1, Math.floor(words / 2));
	return [
		"StartSel=[",
		"StopSel=]",
		`MaxWords=${words}`,
		`MinWords=${minWords}`,
		`MaxFragments=${fragments}`,
		'FragmentDelimiter=" ... "',
	].join(", ");
}
