import type { SourceItem } from "../source/source.types.js";

export interface InspectOptions {
	/** Rows to preview */
	rows: number;
	/** Message lines shown per row */
	lines: number;
}

const DEFAULT_INSPECT: InspectOptions = { rows: 5, lines: 20 };

const SEPARATOR = "-".repeat(30);

/**
 * Preview the head of a corpus export: each row's source path and the first
 * lines of its raw message. Oversized rows are listed by size only.
 */
export async function inspectRows(
	source: AsyncIterable<SourceItem>,
	options: InspectOptions = DEFAULT_INSPECT,
): Promise<string[]> {
	const out: string[] = [];
	let seen = 0;

	for await (const item of source) {
		if (seen >= options.rows) break;
		seen++;

		out.push(`Row ${item.row}`);
		if (item.kind === "oversized") {
			out.push(`oversized: ${item.size} characters`);
		} else {
			out.push(`file: ${item.sourcePath}`);
			out.push("message:");
			const lines = item.rawMessage.trim().split(/\r?\n/);
			for (const line of lines.slice(0, options.lines)) {
				out.push(`    ${line}`);
			}
			if (lines.length > options.lines) {
				out.push("    ...");
			}
		}
		out.push(SEPARATOR);
	}

	return out;
}
