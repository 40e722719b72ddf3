/**
 * How a caller should treat a failed operation
 */
export type ErrorClassification = "retryable" | "non_retryable";

export class ServiceError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly classification: ErrorClassification,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ServiceError";
	}
}

export class RetryableServiceError extends ServiceError {
	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, code, "retryable", options);
		this.name = "RetryableServiceError";
	}
}

export class NonRetryableServiceError extends ServiceError {
	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, code, "non_retryable", options);
		this.name = "NonRetryableServiceError";
	}
}

const RETRYABLE_PATTERNS = [
	/ECONNREFUSED/i,
	/ECONNRESET/i,
	/ETIMEDOUT/i,
	/ENOTFOUND/i,
	/EAI_AGAIN/i,
	/connection.*terminated/i,
	/connection.*reset/i,
	/timeout/i,
	/temporarily unavailable/i,
	/too many connections/i,
	/the database system is (starting up|shutting down)/i,
	/deadlock/i,
	/lock wait timeout/i,
	/network/i,
];

export function classifyError(error: Error): ErrorClassification {
	if (error instanceof ServiceError) {
		return error.classification;
	}

	const code = "code" in error ? String(error.code) : "";
	const haystack = `${code} ${error.message}`;

	for (const pattern of RETRYABLE_PATTERNS) {
		if (pattern.test(haystack)) {
			return "retryable";
		}
	}

	return "non_retryable";
}

/** sysexits EX_TEMPFAIL, so wrappers know a rerun may succeed */
export const EXIT_RETRYABLE = 75;

export function exitCodeFor(error: unknown): number {
	if (!(error instanceof Error)) {
		return 1;
	}
	return classifyError(error) === "retryable" ? EXIT_RETRYABLE : 1;
}
