import type { ZodIssue } from "zod";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class MissingEnvVarError extends ConfigError {
	constructor(
		public readonly variableName: string,
		public readonly description?: string,
	) {
		super(
			`Missing required environment variable: ${variableName}${
				description ? ` (${description})` : ""
			}`,
		);
		this.name = "MissingEnvVarError";
	}
}

export class ValidationError extends ConfigError {
	constructor(
		message: string,
		public readonly errors: Array<{ path: string; message: string }>,
	) {
		super(
			`${message}: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`,
		);
		this.name = "ValidationError";
	}

	static fromIssues(section: string, issues: ZodIssue[]): ValidationError {
		return new ValidationError(
			`Invalid ${section} configuration`,
			issues.map((issue) => ({
				path: issue.path.join("."),
				message: issue.message,
			})),
		);
	}
}
