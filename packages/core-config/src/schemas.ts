import { z } from "zod";

export const serviceIdentitySchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
});

export type ServiceIdentity = z.infer<typeof serviceIdentitySchema>;

export const baseConfigSchema = z.object({
	env: z.enum(["dev", "staging", "prod"]).default("dev"),
	nodeEnv: z.enum(["development", "production", "test"]).default("development"),
	service: serviceIdentitySchema,
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logFormat: z.enum(["json", "pretty"]).default("json"),
});

export type BaseConfig = z.infer<typeof baseConfigSchema>;

export const postgresConfigSchema = z.object({
	/** Takes precedence over the discrete connection fields */
	databaseUrl: z.string().url().optional(),
	host: z.string().min(1),
	port: z.number().int().positive().default(5432),
	database: z.string().min(1),
	user: z.string().min(1),
	password: z.string().optional(),
	ssl: z.boolean().default(false),
	poolMin: z.number().int().nonnegative().default(2),
	poolMax: z.number().int().positive().default(10),
	connectionTimeout: z.number().int().positive().default(10000),
});

export type PostgresConfig = z.infer<typeof postgresConfigSchema>;

export const ingestConfigSchema = z.object({
	csvPath: z.string().min(1).optional(),
	/** Successful insertions per commit */
	batchSize: z.number().int().positive().default(1000),
	/** Largest raw message, in characters, that is parsed at all */
	maxFieldSize: z.number().int().positive().default(1_000_000),
	/** 0 imports everything */
	rowLimit: z.number().int().nonnegative().default(0),
});

export type IngestConfig = z.infer<typeof ingestConfigSchema>;

export const searchConfigSchema = z.object({
	vocabRows: z.number().int().nonnegative().default(20_000),
	vocabMaxTokens: z.number().int().positive().default(80_000),
	similarityCutoff: z.number().min(0).max(1).default(0.7),
	maxCandidates: z.number().int().nonnegative().default(3),
	resultLimit: z.number().int().positive().default(20),
	snippetWords: z.number().int().min(2).default(10),
	snippetFragments: z.number().int().positive().default(3),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;

export const datadogConfigSchema = z.object({
	env: z.string().min(1),
	service: z.string().min(1),
	version: z.string().min(1),
	traceEnabled: z.boolean().default(false),
	logsInjection: z.boolean().default(true),
	runtimeMetricsEnabled: z.boolean().default(false),
});

export type DatadogConfig = z.infer<typeof datadogConfigSchema>;
