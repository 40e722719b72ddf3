import type { NormalizedEmail } from "@mailsift/core-contracts";
import type { LoggerService } from "@mailsift/service-base";
import { Injectable } from "@nestjs/common";
import {
	type MessagePart,
	type ParsedMessage,
	decodeBestEffort,
	parseMessage,
} from "./mime-message.js";

const HEADER_FIELDS = [
	["messageId", "Message-ID"],
	["sentAt", "Date"],
	["sender", "From"],
	["recipients", "To"],
	["subject", "Subject"],
] as const;

// PostgreSQL text columns reject NUL
function withoutNul(text: string): string {
	return text.replace(/\u0000/g, "");
}

function fallbackText(part: MessagePart): string {
	const payload = part.payload();
	if (Buffer.isBuffer(payload)) {
		return payload.length > 0 ? decodeBestEffort(payload) : "";
	}
	return typeof payload === "string" ? payload : "";
}

function decodePart(part: MessagePart): string {
	const decoded = part.decode();
	return (decoded.ok ? decoded.text : fallbackText(part)).trim();
}

/**
 * Best-effort plain-text body.
 *
 * Multipart messages yield their first text/plain part, or nothing; HTML and
 * attachments are never used. Single-part messages yield their payload
 * whatever its type.
 */
export function extractBody(message: ParsedMessage): string {
	const parts = message.parts();

	if (message.isMultipart()) {
		const plain = parts.find((part) => part.contentType === "text/plain");
		return plain ? decodePart(plain) : "";
	}

	const [single] = parts;
	return single ? decodePart(single) : "";
}

@Injectable()
export class NormalizerService {
	constructor(private readonly logger: LoggerService) {}

	/**
	 * Turn one raw message into record fields. Never rejects: input the mail
	 * parser cannot read at all yields a record without headers or body.
	 */
	async normalize(sourcePath: string, raw: string): Promise<NormalizedEmail> {
		let message: ParsedMessage;
		try {
			message = await parseMessage(raw);
		} catch (error) {
			this.logger.warn("Unparseable message stored without headers", {
				source_path: sourcePath,
				error_code: "MESSAGE_UNPARSEABLE",
				reason: error instanceof Error ? error.message : String(error),
			});
			return { sourcePath: withoutNul(sourcePath), body: "" };
		}

		const record: NormalizedEmail = {
			sourcePath: withoutNul(sourcePath),
			body: withoutNul(extractBody(message)).trim(),
		};
		for (const [field, header] of HEADER_FIELDS) {
			const value = message.getHeader(header);
			if (value !== undefined) record[field] = withoutNul(value);
		}
		return record;
	}
}
