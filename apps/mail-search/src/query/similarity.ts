import { distance } from "fastest-levenshtein";

interface Block {
	a: number;
	b: number;
	size: number;
}

/** Longest common run of `a[alo, ahi)` and `b[blo, bhi)`, earliest on ties */
function longestMatch(
	a: string,
	b: string,
	alo: number,
	ahi: number,
	blo: number,
	bhi: number,
): Block {
	let best: Block = { a: alo, b: blo, size: 0 };
	let runs = new Map<number, number>();

	for (let i = alo; i < ahi; i++) {
		const next = new Map<number, number>();
		for (let j = blo; j < bhi; j++) {
			if (a[i] !== b[j]) continue;
			const size = (runs.get(j - 1) ?? 0) + 1;
			next.set(j, size);
			if (size > best.size) {
				best = { a: i - size + 1, b: j - size + 1, size };
			}
		}
		runs = next;
	}
	return best;
}

/** Characters covered by the recursively found longest common runs */
function matchingCharacters(a: string, b: string): number {
	let total = 0;
	const pending: Array<[number, number, number, number]> = [
		[0, a.length, 0, b.length],
	];

	for (let range = pending.pop(); range; range = pending.pop()) {
		const [alo, ahi, blo, bhi] = range;
		const block = longestMatch(a, b, alo, ahi, blo, bhi);
		if (block.size === 0) continue;

		total += block.size;
		if (alo < block.a && blo < block.b) {
			pending.push([alo, block.a, blo, block.b]);
		}
		if (block.a + block.size < ahi && block.b + block.size < bhi) {
			pending.push([block.a + block.size, ahi, block.b + block.size, bhi]);
		}
	}
	return total;
}

/**
 * Ratio of matching characters in [0, 1]: twice the characters shared by
 * common runs over the combined length
 */
export function matchRatio(a: string, b: string): number {
	const length = a.length + b.length;
	if (length === 0) return 1;
	return (2 * matchingCharacters(a, b)) / length;
}

export interface CloseMatchOptions {
	/** Minimum similarity, inclusive */
	cutoff: number;
	/** Matches returned */
	limit: number;
}

interface ScoredWord {
	word: string;
	similarity: number;
	distance: number;
}

function byRank(a: ScoredWord, b: ScoredWord): number {
	if (a.similarity !== b.similarity) return b.similarity - a.similarity;
	if (a.distance !== b.distance) return a.distance - b.distance;
	if (a.word === b.word) return 0;
	return a.word < b.word ? -1 : 1;
}

/**
 * The `limit` words most similar to `term`, best first. Equal similarities are
 * ordered by edit distance, then alphabetically.
 */
export function closeMatches(
	term: string,
	words: Iterable<string>,
	options: CloseMatchOptions,
): string[] {
	const scored: ScoredWord[] = [];
	for (const word of words) {
		const similarity = matchRatio(term, word);
		if (similarity >= options.cutoff) {
			scored.push({ word, similarity, distance: distance(term, word) });
		}
	}

	return scored
		.sort(byRank)
		.slice(0, options.limit)
		.map((entry) => entry.word);
}
