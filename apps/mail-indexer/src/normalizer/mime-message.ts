import {
	type HeaderValue,
	type ParsedMail,
	type SimpleParserOptions,
	simpleParser,
} from "mailparser";
import mailsplit, { type MimeNode } from "mailsplit";

export class DecodeError extends Error {
	constructor(
		message: string,
		public readonly charset: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DecodeError";
	}
}

export type DecodeResult =
	| { ok: true; text: string }
	| { ok: false; error: DecodeError };

export interface MessagePart {
	/** Lowercase MIME type without parameters */
	readonly contentType: string;
	/** Charset-aware decode of the transfer-decoded payload */
	decode(): DecodeResult;
	/** Transfer-decoded payload for fallback decoding */
	payload(): Buffer | string | undefined;
}

/**
 * Read-only view of a parsed message: headers by name and body parts in order
 */
export interface ParsedMessage {
	getHeader(name: string): string | undefined;
	isMultipart(): boolean;
	parts(): readonly MessagePart[];
}

// Only headers are read from the parsed mail
const PARSER_OPTIONS: SimpleParserOptions = {
	skipHtmlToText: true,
	skipTextToHtml: true,
	skipImageLinks: true,
	skipTextLinks: true,
};

export function decodeStrict(payload: Buffer, charset: string): DecodeResult {
	try {
		const decoder = new TextDecoder(charset, { fatal: true });
		return { ok: true, text: decoder.decode(payload) };
	} catch (error) {
		return {
			ok: false,
			error: new DecodeError(`Cannot decode payload as ${charset}`, charset, {
				cause: error,
			}),
		};
	}
}

/**
 * UTF-8 decode that drops undecodable byte sequences
 */
export function decodeBestEffort(payload: Buffer): string {
	return new TextDecoder("utf-8").decode(payload).replace(/\uFFFD/g, "");
}

function headerText(value: HeaderValue): string | undefined {
	if (typeof value === "string") {
		return value;
	}
	if (Array.isArray(value)) {
		return value.join(", ");
	}
	if (value instanceof Date) {
		return undefined;
	}
	if ("text" in value) {
		return value.text;
	}
	return undefined;
}

function nodeField(value: string | false | undefined, fallback: string): string {
	return typeof value === "string" && value !== "" ? value.toLowerCase() : fallback;
}

interface MimeLeaf {
	node: MimeNode;
	body: Buffer[];
}

interface MimeTree {
	multipart: boolean;
	leaves: MimeLeaf[];
}

/**
 * Walk the MIME structure node by node. Container nodes are dropped; every
 * other node keeps its raw body bytes in document order.
 */
async function splitMime(raw: string): Promise<MimeTree> {
	const splitter = new mailsplit.Splitter();
	splitter.end(Buffer.from(raw, "utf-8"));

	const tree: MimeTree = { multipart: false, leaves: [] };
	let seenRoot = false;
	let current: MimeLeaf | undefined;

	for await (const chunk of splitter) {
		if (chunk.type === "node") {
			if (!seenRoot) {
				tree.multipart = Boolean(chunk.multipart);
				seenRoot = true;
			}
			current = chunk.multipart ? undefined : { node: chunk, body: [] };
			if (current) tree.leaves.push(current);
		} else if (chunk.type === "body") {
			current?.body.push(chunk.value);
		}
	}
	return tree;
}

async function transferDecode(node: MimeNode, body: Buffer): Promise<Buffer> {
	const decoder = node.getDecoder();
	decoder.end(body);

	const chunks: Buffer[] = [];
	for await (const chunk of decoder) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks);
}

async function toPart({ node, body }: MimeLeaf): Promise<MessagePart> {
	const payload = await transferDecode(node, Buffer.concat(body));
	const charset = nodeField(node.charset, "utf-8");
	return {
		contentType: nodeField(node.contentType, "text/plain"),
		decode: () => decodeStrict(payload, charset),
		payload: () => payload,
	};
}

class MailparserMessage implements ParsedMessage {
	constructor(
		private readonly mail: ParsedMail,
		private readonly multipart: boolean,
		private readonly bodyParts: readonly MessagePart[],
	) {}

	getHeader(name: string): string | undefined {
		const key = name.toLowerCase();
		const value = this.mail.headers.get(key);
		if (value === undefined) {
			return undefined;
		}
		// Dates and structured headers keep their original text
		return headerText(value) ?? this.rawHeader(key);
	}

	isMultipart(): boolean {
		return this.multipart;
	}

	parts(): readonly MessagePart[] {
		return this.bodyParts;
	}

	private rawHeader(key: string): string | undefined {
		const line = this.mail.headerLines.find((header) => header.key === key)?.line;
		if (line === undefined) {
			return undefined;
		}
		return line
			.slice(line.indexOf(":") + 1)
			.replace(/\r?\n[ \t]+/g, " ")
			.trim();
	}
}

/**
 * Parse raw internet-mail text. Rejects only when the parser itself fails.
 */
export async function parseMessage(raw: string): Promise<ParsedMessage> {
	const [mail, tree] = await Promise.all([
		simpleParser(raw, PARSER_OPTIONS),
		splitMime(raw),
	]);
	const parts = await Promise.all(tree.leaves.map(toPart));
	return new MailparserMessage(mail, tree.multipart, parts);
}
