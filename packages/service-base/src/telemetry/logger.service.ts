import {
	Injectable,
	type LoggerService as NestLoggerService,
} from "@nestjs/common";
import pino, { type Logger as PinoLogger } from "pino";
import type { ServiceConfig } from "../config/config.module.js";
import { LogTier, shouldForwardLog } from "./log-tier.js";

export const LOGGER = "LOGGER";

const PII_PATTERNS = [
	/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

const SENSITIVE_KEYS = [
	/password/i,
	/secret/i,
	/token/i,
	/api_?key/i,
	/auth/i,
	/credential/i,
	/private/i,
	/body/i, // Never log message bodies
	/raw_?message/i,
	/snippet/i,
];

function redactValue(value: unknown): unknown {
	if (typeof value === "string") {
		let result = value;
		for (const pattern of PII_PATTERNS) {
			result = result.replace(pattern, "[PII_REDACTED]");
		}
		return result;
	}

	if (Array.isArray(value)) {
		return value.map(redactValue);
	}

	if (value && typeof value === "object") {
		return redactObject(value);
	}

	return value;
}

export function redactObject(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(obj)) {
		if (SENSITIVE_KEYS.some((p) => p.test(key))) {
			result[key] = "[REDACTED]";
			continue;
		}

		result[key] = redactValue(value);
	}

	return result;
}

export interface LogContext {
	trace_id?: string;
	span_id?: string;
	email_id?: number;
	source_path?: string;
	stage?: string;
	error_code?: string;
	duration_ms?: number;
	[key: string]: unknown;
}

export interface TieredLogContext extends LogContext {
	tier?: LogTier;
}

@Injectable()
export class LoggerService implements NestLoggerService {
	private readonly pino: PinoLogger;
	private readonly baseTags: Record<string, string>;

	constructor(
		private readonly config: ServiceConfig,
		instance?: PinoLogger,
	) {
		this.baseTags = {
			env: config.base.env,
			service: config.base.service.name,
			version: config.base.service.version,
		};
		this.pino = instance ?? pino(LoggerService.pinoOptions(config));
	}

	private static pinoOptions(config: ServiceConfig): pino.LoggerOptions {
		const options: pino.LoggerOptions = {
			level: config.logging.level,
			base: {
				env: config.base.env,
				service: config.base.service.name,
				version: config.base.service.version,
			},
			formatters: {
				level: (label: string) => ({ level: label }),
			},
			timestamp: pino.stdTimeFunctions.isoTime,
		};

		// JSON by default, pretty only when asked for
		if (config.base.logFormat === "pretty") {
			options.transport = {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:standard",
					ignore: "pid,hostname",
				},
			};
		}

		return options;
	}

	private formatContext(
		context?: TieredLogContext,
		defaultTier: LogTier = LogTier.OPERATIONAL,
	): Record<string, unknown> {
		const base = { ...this.baseTags };

		if (!context) {
			const { forward } = shouldForwardLog(defaultTier, this.config.logging);
			return {
				...base,
				tier: defaultTier,
				"dd.forward": forward,
			};
		}

		const { tier = defaultTier, ...contextWithoutTier } = context;
		const { forward, sampled } = shouldForwardLog(
			tier,
			this.config.logging,
			context.trace_id,
		);

		return {
			...base,
			...redactObject(contextWithoutTier),
			tier,
			"dd.forward": forward,
			...(sampled !== undefined && { "dd.sampled": sampled }),
			dd: {
				trace_id: context.trace_id,
				span_id: context.span_id,
			},
		};
	}

	log(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.info({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.info(this.formatContext(context), message);
		}
	}

	error(message: string, trace?: string, context?: string): void {
		this.pino.error(
			{ ...this.baseTags, nestContext: context, stack: trace },
			message,
		);
	}

	warn(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.warn({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.warn(this.formatContext(context), message);
		}
	}

	debug(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.debug({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.debug(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	verbose(message: string, context?: LogContext | string): void {
		if (typeof context === "string") {
			this.pino.trace({ ...this.baseTags, nestContext: context }, message);
		} else {
			this.pino.trace(this.formatContext(context, LogTier.DEBUG), message);
		}
	}

	info(message: string, context?: LogContext): void {
		this.pino.info(this.formatContext(context), message);
	}

	child(bindings: Record<string, unknown>): LoggerService {
		return new LoggerService(this.config, this.pino.child(redactObject(bindings)));
	}

	/**
	 * Always forwarded. Use for failures that end the process.
	 */
	critical(message: string, context?: LogContext): void {
		this.pino.error(
			this.formatContext(
				{ ...context, tier: LogTier.CRITICAL },
				LogTier.CRITICAL,
			),
			message,
		);
	}

	operational(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.OPERATIONAL },
				LogTier.OPERATIONAL,
			),
			message,
		);
	}

	lifecycle(message: string, context?: LogContext): void {
		this.pino.info(
			this.formatContext(
				{ ...context, tier: LogTier.LIFECYCLE },
				LogTier.LIFECYCLE,
			),
			message,
		);
	}

	/**
	 * Flush buffered lines before the process exits
	 */
	flush(): void {
		this.pino.flush();
	}
}
