import type { SearchResult } from "@mailsift/core-contracts";

const BODY_PREVIEW_CHARS = 2000;

function preview(body: string): string {
	return body.length > BODY_PREVIEW_CHARS
		? `${body.slice(0, BODY_PREVIEW_CHARS)}...`
		: body;
}

/**
 * Terminal listing of ranked hits, numbered from 1
 */
export function renderResults(results: readonly SearchResult[]): string {
	if (results.length === 0) {
		return "No matches found.\n";
	}

	const blocks = results.map((result, index) =>
		[
			`${index + 1}. ${result.subject || "(no subject)"}`,
			`From: ${result.sender ?? ""}`,
			`Date: ${result.sentAt ?? ""}`,
			`File: ${result.sourcePath}`,
			`Match: ${result.snippet}`,
			"",
			preview(result.body),
		].join("\n"),
	);
	return `${blocks.join("\n\n")}\n`;
}
