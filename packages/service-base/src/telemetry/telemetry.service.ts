import { createRequire } from "node:module";
import type { DatadogConfig } from "@mailsift/core-config";
import { Injectable } from "@nestjs/common";
import type { Span, Tracer } from "dd-trace";

const require = createRequire(import.meta.url);

const METRIC_PREFIX = "mailsift";

@Injectable()
export class TelemetryService {
	private tracer: Tracer | null = null;
	private baseTags: Record<string, string> = {};

	initialize(config: DatadogConfig): void {
		this.baseTags = {
			env: config.env,
			service: config.service,
			version: config.version,
		};

		if (!config.traceEnabled) {
			return;
		}

		// Loaded lazily so disabled tracing never patches modules
		// eslint-disable-next-line @typescript-eslint/no-require-imports
		const ddTrace = require("dd-trace") as { default: Tracer };
		this.tracer = ddTrace.default.init({
			service: config.service,
			version: config.version,
			env: config.env,
			logInjection: config.logsInjection,
			runtimeMetrics: config.runtimeMetricsEnabled,
		});
	}

	getMetricTags(extra?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...extra };
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.increment(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.tracer?.dogstatsd.gauge(
			`${METRIC_PREFIX}.${name}`,
			value,
			this.getMetricTags(tags),
		);
	}

	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.tracer?.dogstatsd.histogram(
			`${METRIC_PREFIX}.${name}`,
			durationMs,
			this.getMetricTags(tags),
		);
	}

	/**
	 * Run `fn` inside a span; runs it untraced when tracing is off
	 */
	async withSpan<T>(
		name: string,
		tags: Record<string, string>,
		fn: () => Promise<T>,
	): Promise<T> {
		if (!this.tracer) {
			return fn();
		}

		return this.tracer.trace(name, { tags }, async (span: Span | undefined) => {
			try {
				return await fn();
			} catch (error) {
				span?.setTag("error", true);
				if (error instanceof Error) {
					span?.setTag("error.message", error.message);
				}
				throw error;
			}
		});
	}
}
