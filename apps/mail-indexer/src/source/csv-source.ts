import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { NonRetryableServiceError } from "@mailsift/service-base";
import { parse } from "csv-parse";
import { z } from "zod";
import { FieldSizeGuard } from "./field-size-guard.js";
import type { SourceItem } from "./source.types.js";

/**
 * Columns of the corpus export: origin path and the raw RFC822 text
 */
const csvRowSchema = z
	.object({
		file: z.string(),
		message: z.string(),
	})
	.passthrough();

/**
 * Longest original field of a record, when any was cut short by the guard
 */
function oversizedFieldSize(
	guard: FieldSizeGuard,
	record: Record<string, unknown>,
	maxFieldSize: number,
): number | undefined {
	let size: number | undefined;
	for (const value of Object.values(record)) {
		if (typeof value !== "string" || value.length <= maxFieldSize) continue;
		const original = guard.takeOversized() ?? value.length;
		size = Math.max(size ?? 0, original);
	}
	return size;
}

export interface CsvSourceOptions {
	/** Largest field, in characters, delivered to the indexer */
	maxFieldSize: number;
}

/**
 * Stream `file,message` rows from CSV text.
 * Rows with a field longer than `maxFieldSize` come back as `oversized`; such
 * fields are cut short before parsing and never held in full.
 */
export async function* readCsvSource(
	input: Readable,
	options: CsvSourceOptions,
): AsyncGenerator<SourceItem> {
	const parser = parse({
		columns: true,
		bom: true,
		skip_empty_lines: true,
	});
	const guard = new FieldSizeGuard(options.maxFieldSize);
	input.on("error", (error) => parser.destroy(error));
	guard.on("error", (error) => parser.destroy(error));
	input.pipe(guard).pipe(parser);

	const records: AsyncIterable<unknown> = parser;
	let row = 0;
	try {
		for await (const record of records) {
			row++;
			const parsed = csvRowSchema.safeParse(record);
			if (!parsed.success) {
				throw new NonRetryableServiceError(
					`CSV row ${row} lacks a file or message column`,
					"INVALID_SOURCE_ROW",
				);
			}

			const size = oversizedFieldSize(guard, parsed.data, options.maxFieldSize);
			if (size !== undefined) {
				yield { kind: "oversized", row, size };
				continue;
			}

			const { file, message } = parsed.data;
			yield { kind: "row", row, sourcePath: file, rawMessage: message };
		}
	} finally {
		input.unpipe(guard);
		guard.unpipe(parser);
		parser.destroy();
		guard.destroy();
		input.destroy();
	}
}

export function openCsvSource(
	path: string,
	options: CsvSourceOptions,
): AsyncGenerator<SourceItem> {
	return readCsvSource(createReadStream(path, { encoding: "utf8" }), options);
}
