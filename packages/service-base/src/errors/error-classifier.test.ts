import { describe, expect, it } from "vitest";
import {
	EXIT_RETRYABLE,
	NonRetryableServiceError,
	RetryableServiceError,
	classifyError,
	exitCodeFor,
} from "./error-classifier.js";

describe("classifyError", () => {
	it("should trust the classification of service errors", () => {
		expect(
			classifyError(new RetryableServiceError("later", "STORE_UNAVAILABLE")),
		).toBe("retryable");
		expect(
			classifyError(new NonRetryableServiceError("timeout", "BAD_ROW")),
		).toBe("non_retryable");
	});

	it("should treat connection failures as retryable", () => {
		expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:5432"))).toBe(
			"retryable",
		);
		expect(classifyError(new Error("Connection terminated unexpectedly"))).toBe(
			"retryable",
		);
	});

	it("should read the error code as well as the message", () => {
		const error = Object.assign(new Error("socket closed"), {
			code: "ECONNRESET",
		});

		expect(classifyError(error)).toBe("retryable");
	});

	it("should treat anything else as non-retryable", () => {
		expect(classifyError(new Error('relation "emails" does not exist'))).toBe(
			"non_retryable",
		);
	});
});

describe("exitCodeFor", () => {
	it("should return EX_TEMPFAIL for retryable failures", () => {
		expect(EXIT_RETRYABLE).toBe(75);
		expect(exitCodeFor(new Error("ETIMEDOUT"))).toBe(75);
	});

	it("should return 1 for other failures", () => {
		expect(exitCodeFor(new Error("bad input"))).toBe(1);
		expect(exitCodeFor("not an error")).toBe(1);
	});
});
