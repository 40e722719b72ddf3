/**
 * One item of the raw input stream. Oversized rows are reported, not delivered.
 */
export type SourceItem =
	| { kind: "row"; row: number; sourcePath: string; rawMessage: string }
	| { kind: "oversized"; row: number; size: number };

export type SourceRow = Extract<SourceItem, { kind: "row" }>;
