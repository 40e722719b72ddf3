// Mail records and results
export type {
	NormalizedEmail,
	EmailRecord,
	SearchResult,
	IngestSummary,
} from "./mail.js";

// Query expressions
export type {
	ExpandedTerm,
	QueryGroup,
	QueryExpression,
	CompiledQuery,
} from "./query.js";
export { isEmptyExpression } from "./query.js";
