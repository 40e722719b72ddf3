import type { MailStore } from "@mailsift/mail-store";

export interface VocabularyOptions {
	/** Records scanned, in id order */
	maxRows: number;
	/** Distinct tokens kept */
	maxTokens: number;
	/** Records fetched per store read */
	chunkRows?: number;
}

export const VOCABULARY_CHUNK_ROWS = 500;

const MIN_TOKEN_LENGTH = 3;
const MAX_TOKEN_LENGTH = 20;

const NON_LETTER = /\P{L}/gu;

/**
 * Lowercased whitespace-separated words with every non-letter removed,
 * keeping those of 3 to 20 letters
 */
export function vocabularyTokens(text: string): string[] {
	const tokens: string[] = [];
	for (const raw of text.toLowerCase().split(/\s+/)) {
		const token = raw.replace(NON_LETTER, "");
		if (
			token.length >= MIN_TOKEN_LENGTH &&
			token.length <= MAX_TOKEN_LENGTH
		) {
			tokens.push(token);
		}
	}
	return tokens;
}

/**
 * Collect candidate words for fuzzy expansion from the earliest records.
 * Records are read in id-ordered chunks; no chunk is fetched once
 * `maxTokens` distinct words are known.
 */
export async function sampleVocabulary(
	store: MailStore,
	options: VocabularyOptions,
): Promise<ReadonlySet<string>> {
	const vocabulary = new Set<string>();
	const chunkRows = options.chunkRows ?? VOCABULARY_CHUNK_ROWS;
	let read = 0;
	let afterId = 0;

	while (read < options.maxRows) {
		const limit = Math.min(chunkRows, options.maxRows - read);
		const samples = await store.sampleText(afterId, limit);

		for (const { id, subject, body } of samples) {
			afterId = id;
			for (const token of vocabularyTokens(`${subject ?? ""} ${body ?? ""}`)) {
				vocabulary.add(token);
				if (vocabulary.size >= options.maxTokens) {
					return vocabulary;
				}
			}
		}

		read += samples.length;
		if (samples.length < limit) break;
	}

	return vocabulary;
}
