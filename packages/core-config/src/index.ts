export {
	loadConfig,
	type ConfigLoaderOptions,
	type FullConfig,
} from "./loader.js";
export {
	baseConfigSchema,
	postgresConfigSchema,
	ingestConfigSchema,
	searchConfigSchema,
	datadogConfigSchema,
} from "./schemas.js";
export type {
	BaseConfig,
	PostgresConfig,
	IngestConfig,
	SearchConfig,
	DatadogConfig,
	ServiceIdentity,
} from "./schemas.js";
export { ConfigError, MissingEnvVarError, ValidationError } from "./errors.js";
