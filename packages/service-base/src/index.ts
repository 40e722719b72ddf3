// Config module
export {
	ServiceConfigModule,
	SERVICE_CONFIG,
	createServiceConfig,
} from "./config/config.module.js";
export type {
	ServiceConfig,
	ServiceConfigOptions,
} from "./config/config.module.js";

// Telemetry module
export { TelemetryModule } from "./telemetry/telemetry.module.js";
export { TelemetryService } from "./telemetry/telemetry.service.js";
export { LoggerService, LOGGER, redactObject } from "./telemetry/logger.service.js";
export type {
	LogContext,
	TieredLogContext,
} from "./telemetry/logger.service.js";
export {
	LogTier,
	type LoggingConfig,
	shouldForwardLog,
	loggingConfigFor,
	PRODUCTION_LOGGING_CONFIG,
	LOCAL_LOGGING_CONFIG,
} from "./telemetry/log-tier.js";

// Lifecycle module
export { LifecycleModule } from "./lifecycle/lifecycle.module.js";
export { LifecycleService } from "./lifecycle/lifecycle.service.js";
export type {
	ExitFn,
	LifecycleOptions,
	ShutdownSignal,
} from "./lifecycle/lifecycle.service.js";

// Errors
export {
	ServiceError,
	RetryableServiceError,
	NonRetryableServiceError,
	classifyError,
	exitCodeFor,
	EXIT_RETRYABLE,
} from "./errors/error-classifier.js";
export type { ErrorClassification } from "./errors/error-classifier.js";
