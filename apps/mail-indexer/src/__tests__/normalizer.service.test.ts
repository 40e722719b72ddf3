import { createSilentLogger } from "@mailsift/service-base/testing";
import { describe, expect, it, vi } from "vitest";
import {
	type DecodeResult,
	type MessagePart,
	type ParsedMessage,
	DecodeError,
	decodeBestEffort,
	decodeStrict,
} from "../normalizer/mime-message.js";
import {
	NormalizerService,
	extractBody,
} from "../normalizer/normalizer.service.js";

const failed: DecodeResult = {
	ok: false,
	error: new DecodeError("Cannot decode payload as utf-8", "utf-8"),
};

function part(
	contentType: string,
	decoded: DecodeResult,
	payload?: Buffer | string,
): MessagePart {
	return { contentType, decode: () => decoded, payload: () => payload };
}

function message(multipart: boolean, parts: MessagePart[]): ParsedMessage {
	return {
		getHeader: () => undefined,
		isMultipart: () => multipart,
		parts: () => parts,
	};
}

describe("decodeStrict", () => {
	it("should decode with the declared charset", () => {
		const result = decodeStrict(
			Buffer.from([0x63, 0x61, 0x66, 0xe9]),
			"iso-8859-1",
		);

		expect(result).toEqual({ ok: true, text: "café" });
	});

	it("should fail on bytes invalid for the charset", () => {
		const result = decodeStrict(Buffer.from([0x61, 0xff]), "utf-8");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.charset).toBe("utf-8");
		}
	});

	it("should fail on an unknown charset", () => {
		expect(decodeStrict(Buffer.from("abc"), "x-unknown").ok).toBe(false);
	});
});

describe("decodeBestEffort", () => {
	it("should drop undecodable bytes", () => {
		const payload = Buffer.concat([
			Buffer.from("caf"),
			Buffer.from([0xff, 0xfe]),
			Buffer.from(" ok"),
		]);

		expect(decodeBestEffort(payload)).toBe("caf ok");
	});
});

describe("extractBody", () => {
	it("should use the first text/plain part of a multipart message", () => {
		const body = extractBody(
			message(true, [
				part("application/pdf", { ok: true, text: "%PDF" }),
				part("text/html", { ok: true, text: "<p>html</p>" }),
				part("text/plain", { ok: true, text: "  first plain \n" }),
				part("text/plain", { ok: true, text: "second plain" }),
			]),
		);

		expect(body).toBe("first plain");
	});

	it("should return nothing for multipart without text/plain", () => {
		const body = extractBody(
			message(true, [part("text/html", { ok: true, text: "<p>hi</p>" })]),
		);

		expect(body).toBe("");
	});

	it("should fall back to raw bytes when the text part cannot be decoded", () => {
		const body = extractBody(
			message(true, [
				part(
					"text/plain",
					failed,
					Buffer.concat([Buffer.from(" na"), Buffer.from([0xc3]), Buffer.from("ive ")]),
				),
			]),
		);

		expect(body).toBe("naive");
	});

	it("should use a single part whatever its type", () => {
		expect(
			extractBody(message(false, [part("text/html", { ok: true, text: " <b>x</b> " })])),
		).toBe("<b>x</b>");
	});

	it("should use a string payload when a single part fails to decode", () => {
		expect(
			extractBody(message(false, [part("text/plain", failed, "  as is  ")])),
		).toBe("as is");
	});

	it("should return nothing when no payload is available", () => {
		expect(extractBody(message(false, [part("text/plain", failed)]))).toBe("");
		expect(extractBody(message(false, []))).toBe("");
	});
});

describe("NormalizerService", () => {
	const normalizer = new NormalizerService(createSilentLogger());

	it("should read headers and the plain body", async () => {
		const raw = [
			"Message-ID: <1001.test@example.com>",
			"Date: Mon, 14 May 2001 16:39:00 -0700 (PDT)",
			"From: alice@example.com",
			"To: bob@example.com",
			"Subject: Quarterly numbers",
			"",
			"Numbers attached.",
			"",
		].join("\n");

		const record = await normalizer.normalize("maildir/alice/1.", raw);

		expect(record.sourcePath).toBe("maildir/alice/1.");
		expect(record.messageId).toBe("<1001.test@example.com>");
		expect(record.sentAt).toBe("Mon, 14 May 2001 16:39:00 -0700 (PDT)");
		expect(record.sender).toContain("alice@example.com");
		expect(record.recipients).toContain("bob@example.com");
		expect(record.subject).toBe("Quarterly numbers");
		expect(record.body).toBe("Numbers attached.");
	});

	it("should leave missing headers undefined", async () => {
		const record = await normalizer.normalize(
			"maildir/x/2.",
			"Subject: Only a subject\n\nText\n",
		);

		expect(record.subject).toBe("Only a subject");
		expect(record.messageId).toBeUndefined();
		expect(record.sender).toBeUndefined();
		expect(record.recipients).toBeUndefined();
		expect(record.sentAt).toBeUndefined();
	});

	it("should find the text part after an attachment", async () => {
		const raw = [
			"Subject: Report",
			'Content-Type: multipart/mixed; boundary="sep"',
			"",
			"--sep",
			"Content-Type: application/octet-stream",
			'Content-Disposition: attachment; filename="data.bin"',
			"Content-Transfer-Encoding: base64",
			"",
			"AAECAw==",
			"--sep",
			"Content-Type: text/plain; charset=utf-8",
			"",
			"The plain part.",
			"--sep--",
			"",
		].join("\n");

		const record = await normalizer.normalize("maildir/x/3.", raw);

		expect(record.body).toBe("The plain part.");
	});

	it("should keep only the first of several inline plain parts", async () => {
		const raw = [
			"Subject: Two parts",
			'Content-Type: multipart/mixed; boundary="two"',
			"",
			"--two",
			"Content-Type: text/plain; charset=utf-8",
			"",
			"first part",
			"--two",
			"Content-Type: text/plain; charset=utf-8",
			"",
			"second part",
			"--two--",
			"",
		].join("\n");

		const record = await normalizer.normalize("maildir/x/6.", raw);

		expect(record.body).toBe("first part");
	});

	it("should undo the transfer encoding of the plain part", async () => {
		const raw = [
			'Content-Type: multipart/alternative; boundary="qp"',
			"",
			"--qp",
			"Content-Type: text/plain; charset=iso-8859-1",
			"Content-Transfer-Encoding: quoted-printable",
			"",
			"caf=E9 au lait",
			"--qp--",
			"",
		].join("\n");

		const record = await normalizer.normalize("maildir/x/7.", raw);

		expect(record.body).toBe("café au lait");
	});

	it("should strip NUL characters from headers and body", async () => {
		const record = await normalizer.normalize(
			"maildir/x/8.",
			"Subject: a\u0000b\n\nhello\u0000world\n",
		);

		expect(record.subject).toBe("ab");
		expect(record.body).toBe("helloworld");
	});

	it("should ignore HTML when a multipart message has no plain text", async () => {
		const raw = [
			"Subject: Newsletter",
			'Content-Type: multipart/alternative; boundary="alt"',
			"",
			"--alt",
			"Content-Type: text/html; charset=utf-8",
			"",
			"<p>Only HTML here</p>",
			"--alt--",
			"",
		].join("\n");

		const record = await normalizer.normalize("maildir/x/4.", raw);

		expect(record.subject).toBe("Newsletter");
		expect(record.body).toBe("");
	});

	it("should produce an empty record for empty input", async () => {
		const record = await normalizer.normalize("maildir/x/5.", "");

		expect(record).toEqual({ sourcePath: "maildir/x/5.", body: "" });
	});

	it("should not log anything for well-formed input", async () => {
		const logger = createSilentLogger();
		const warnSpy = vi.spyOn(logger, "warn");

		await new NormalizerService(logger).normalize("a", "Subject: x\n\ny\n");

		expect(warnSpy).not.toHaveBeenCalled();
	});
});
