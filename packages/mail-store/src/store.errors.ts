import {
	type ErrorClassification,
	ServiceError,
	classifyError,
} from "@mailsift/service-base";

export type StoreErrorCode = "STORE_UNAVAILABLE" | "SCHEMA_MISSING";

/**
 * The store cannot serve the operation at all.
 * Raised to the caller, never swallowed.
 */
export class StoreUnavailableError extends ServiceError {
	constructor(
		message: string,
		code: StoreErrorCode,
		classification: ErrorClassification,
		options?: { cause?: unknown },
	) {
		super(message, code, classification, options);
		this.name = "StoreUnavailableError";
	}
}

// SQLSTATE undefined_table, invalid_schema_name
const SCHEMA_MISSING_STATES = new Set(["42P01", "3F000"]);

// connection_exception class and admin/crash shutdown
const UNAVAILABLE_STATE = /^(08|57P0[1-3])/;

function sqlState(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string"
		? error.code
		: undefined;
}

/**
 * Map a driver error onto the store taxonomy; other errors pass through
 */
export function toStoreError(error: unknown): unknown {
	if (!(error instanceof Error) || error instanceof ServiceError) {
		return error;
	}

	const state = sqlState(error);
	if (state && SCHEMA_MISSING_STATES.has(state)) {
		return new StoreUnavailableError(
			`Mail store schema is missing: ${error.message}`,
			"SCHEMA_MISSING",
			"non_retryable",
			{ cause: error },
		);
	}

	if (
		(state && UNAVAILABLE_STATE.test(state)) ||
		classifyError(error) === "retryable"
	) {
		return new StoreUnavailableError(
			`Mail store unavailable: ${error.message}`,
			"STORE_UNAVAILABLE",
			"retryable",
			{ cause: error },
		);
	}

	return error;
}
