/**
 * A user term and the lexemes it expands to.
 * The exact lowercased term is always one of the alternatives.
 */
export interface ExpandedTerm {
	term: string;
	alternatives: readonly string[];
}

/** Terms that must all match */
export type QueryGroup = readonly ExpandedTerm[];

/**
 * Disjunction of AND-groups, in user input order.
 * An expression without groups matches nothing.
 */
export interface QueryExpression {
	groups: readonly QueryGroup[];
}

/**
 * A query expression together with its rendering in the store's grammar
 */
export interface CompiledQuery {
	expression: QueryExpression;
	text: string;
}

export function isEmptyExpression(expression: QueryExpression): boolean {
	return expression.groups.length === 0;
}
