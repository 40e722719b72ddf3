import type { z } from "zod";
import { MissingEnvVarError, ValidationError } from "./errors.js";
import {
	type BaseConfig,
	type DatadogConfig,
	type IngestConfig,
	type PostgresConfig,
	type SearchConfig,
	baseConfigSchema,
	datadogConfigSchema,
	ingestConfigSchema,
	postgresConfigSchema,
	searchConfigSchema,
} from "./schemas.js";

export interface ConfigLoaderOptions {
	/** Throw on missing required vars instead of using defaults */
	strict?: boolean;
	/** Custom environment object (defaults to process.env) */
	env?: Record<string, string | undefined>;
	/** Service name used when SERVICE_NAME is unset */
	defaultServiceName?: string;
}

type EnvValue = string | number | boolean;

interface EnvVarDef {
	key: string;
	required?: boolean;
	default?: EnvValue;
	transform?: (value: string) => EnvValue;
}

function getEnvVar(
	env: Record<string, string | undefined>,
	def: EnvVarDef,
	strict: boolean,
): EnvValue | undefined {
	const value = env[def.key];

	if (value === undefined || value === "") {
		if (def.required && strict) {
			throw new MissingEnvVarError(def.key);
		}
		return def.default;
	}

	if (def.transform) {
		return def.transform(value);
	}

	return value;
}

const toBool = (v: string): boolean => v.toLowerCase() === "true" || v === "1";
const toInt = (v: string): number => Number.parseInt(v, 10);
const toFloat = (v: string): number => Number.parseFloat(v);

export interface FullConfig {
	base: BaseConfig;
	postgres: PostgresConfig;
	ingest: IngestConfig;
	search: SearchConfig;
	datadog: DatadogConfig;
}

function validateSchema<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	name: string,
): T {
	const result = schema.safeParse(data);
	if (!result.success) {
		throw ValidationError.fromIssues(name, result.error.issues);
	}
	return result.data;
}

export function loadConfig(options: ConfigLoaderOptions = {}): FullConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;
	const read = (def: EnvVarDef) => getEnvVar(env, def, strict);

	const serviceName = String(
		read({
			key: "SERVICE_NAME",
			required: true,
			default: options.defaultServiceName ?? "mailsift",
		}),
	);
	const serviceVersion = String(
		read({ key: "SERVICE_VERSION", default: "0.1.0" }),
	);
	const envName = String(read({ key: "ENV", default: "dev" }));

	const baseRaw = {
		env: envName,
		nodeEnv: read({ key: "NODE_ENV", default: "development" }),
		service: {
			name: serviceName,
			version: serviceVersion,
		},
		logLevel: read({ key: "LOG_LEVEL", default: "info" }),
		logFormat: read({ key: "LOG_FORMAT", default: "json" }),
	};

	const postgresRaw = {
		databaseUrl: read({ key: "DATABASE_URL" }),
		host: read({ key: "POSTGRES_HOST", default: "localhost" }),
		port: read({ key: "POSTGRES_PORT", default: 5432, transform: toInt }),
		database: read({ key: "POSTGRES_DB", default: "mailsift" }),
		user: read({ key: "POSTGRES_USER", default: "mailsift" }),
		password: read({ key: "POSTGRES_PASSWORD" }),
		ssl: read({ key: "POSTGRES_SSL", default: false, transform: toBool }),
		poolMin: read({ key: "POSTGRES_POOL_MIN", default: 2, transform: toInt }),
		poolMax: read({ key: "POSTGRES_POOL_MAX", default: 10, transform: toInt }),
		connectionTimeout: read({
			key: "POSTGRES_CONNECTION_TIMEOUT",
			default: 10000,
			transform: toInt,
		}),
	};

	const ingestRaw = {
		csvPath: read({ key: "INGEST_CSV_PATH" }),
		batchSize: read({ key: "INGEST_BATCH_SIZE", default: 1000, transform: toInt }),
		maxFieldSize: read({
			key: "INGEST_MAX_FIELD_SIZE",
			default: 1_000_000,
			transform: toInt,
		}),
		rowLimit: read({ key: "INGEST_ROW_LIMIT", default: 0, transform: toInt }),
	};

	const searchRaw = {
		vocabRows: read({ key: "SEARCH_VOCAB_ROWS", default: 20_000, transform: toInt }),
		vocabMaxTokens: read({
			key: "SEARCH_VOCAB_MAX_TOKENS",
			default: 80_000,
			transform: toInt,
		}),
		similarityCutoff: read({
			key: "SEARCH_SIMILARITY_CUTOFF",
			default: 0.7,
			transform: toFloat,
		}),
		maxCandidates: read({
			key: "SEARCH_MAX_CANDIDATES",
			default: 3,
			transform: toInt,
		}),
		resultLimit: read({ key: "SEARCH_RESULT_LIMIT", default: 20, transform: toInt }),
		snippetWords: read({
			key: "SEARCH_SNIPPET_WORDS",
			default: 10,
			transform: toInt,
		}),
		snippetFragments: read({
			key: "SEARCH_SNIPPET_FRAGMENTS",
			default: 3,
			transform: toInt,
		}),
	};

	const datadogRaw = {
		env: read({ key: "DD_ENV", default: envName }),
		service: read({ key: "DD_SERVICE", default: serviceName }),
		version: read({ key: "DD_VERSION", default: serviceVersion }),
		traceEnabled: read({
			key: "DD_TRACE_ENABLED",
			default: false,
			transform: toBool,
		}),
		logsInjection: read({
			key: "DD_LOGS_INJECTION",
			default: true,
			transform: toBool,
		}),
		runtimeMetricsEnabled: read({
			key: "DD_RUNTIME_METRICS_ENABLED",
			default: false,
			transform: toBool,
		}),
	};

	// Zod applies the remaining defaults and range checks
	return {
		base: validateSchema(baseConfigSchema, baseRaw, "base"),
		postgres: validateSchema(postgresConfigSchema, postgresRaw, "postgres"),
		ingest: validateSchema(ingestConfigSchema, ingestRaw, "ingest"),
		search: validateSchema(searchConfigSchema, searchRaw, "search"),
		datadog: validateSchema(datadogConfigSchema, datadogRaw, "datadog"),
	};
}
