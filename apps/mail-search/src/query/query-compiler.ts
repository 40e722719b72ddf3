import type {
	CompiledQuery,
	ExpandedTerm,
	QueryExpression,
	QueryGroup,
} from "@mailsift/core-contracts";
import { closeMatches } from "./similarity.js";

export interface QueryCompilerOptions {
	/** Minimum match ratio for a vocabulary word to join a term */
	similarityCutoff: number;
	/** Vocabulary words added per term */
	maxCandidates: number;
}

const OR_OPERATOR = "or";

/**
 * Split query text into AND-groups separated by `or` (any case).
 * Operators never become terms; a group that would be empty is not opened.
 */
export function groupTokens(text: string): string[][] {
	const tokens = text.trim().split(/\s+/).filter(Boolean);
	const groups: string[][] = [[]];

	for (const token of tokens) {
		if (token.toLowerCase() === OR_OPERATOR) {
			const current = groups[groups.length - 1];
			if (current && current.length > 0) groups.push([]);
			continue;
		}
		groups[groups.length - 1]?.push(token);
	}

	return groups.filter((group) => group.length > 0);
}

function quoteLexeme(word: string): string {
	const escaped = word.replace(/\\/g, "\\\\").replace(/'/g, "''");
	return `'${escaped}':*`;
}

function renderTerm(term: ExpandedTerm): string {
	const [only, ...rest] = term.alternatives;
	if (only !== undefined && rest.length === 0) return quoteLexeme(only);
	return `(${term.alternatives.map(quoteLexeme).join(" | ")})`;
}

function renderGroup(group: QueryGroup): string {
	return group.map(renderTerm).join(" & ");
}

/**
 * Render an expression as PostgreSQL `tsquery` text with prefix matching
 * on every lexeme
 */
export function renderTsQuery(expression: QueryExpression): string {
	const [only, ...rest] = expression.groups;
	if (only !== undefined && rest.length === 0) return renderGroup(only);
	return expression.groups.map((group) => `(${renderGroup(group)})`).join(" | ");
}

/**
 * Turns free text into a boolean full-text query, widening each term with
 * similar words from a fixed vocabulary.
 */
export class QueryCompiler {
	constructor(
		private readonly vocabulary: ReadonlySet<string>,
		private readonly options: QueryCompilerOptions,
	) {}

	expandTerm(term: string): ExpandedTerm {
		const lowered = term.toLowerCase();
		const matches = closeMatches(lowered, this.vocabulary, {
			cutoff: this.options.similarityCutoff,
			limit: this.options.maxCandidates,
		});
		const alternatives = matches.includes(lowered)
			? matches
			: [lowered, ...matches];
		return { term, alternatives };
	}

	parse(text: string): QueryExpression {
		return {
			groups: groupTokens(text).map((group) =>
				group.map((token) => this.expandTerm(token)),
			),
		};
	}

	compile(text: string): CompiledQuery {
		const expression = this.parse(text);
		return { expression, text: renderTsQuery(expression) };
	}
}
