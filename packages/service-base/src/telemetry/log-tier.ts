/**
 * Log tiers decide which log lines get the `dd.forward` flag:
 * - CRITICAL: always forwarded (fatal store errors, uncaught exceptions)
 * - OPERATIONAL: ingestion and search outcomes
 * - LIFECYCLE: startup, shutdown, schema setup
 * - DEBUG: per-row detail, forwarded only when sampled
 */
export enum LogTier {
	CRITICAL = "critical",
	OPERATIONAL = "operational",
	LIFECYCLE = "lifecycle",
	DEBUG = "debug",
}

export interface LoggingConfig {
	/** Base log level (debug, info, warn, error) */
	level: string;
	/** Tiers that get forwarded */
	shipTiers: LogTier[];
	/** Share of debug logs to forward (0-1) */
	sampleDebugRate: number;
}

export const PRODUCTION_LOGGING_CONFIG: LoggingConfig = {
	level: "info",
	shipTiers: [LogTier.CRITICAL, LogTier.OPERATIONAL, LogTier.LIFECYCLE],
	sampleDebugRate: 0,
};

export const LOCAL_LOGGING_CONFIG: LoggingConfig = {
	level: "debug",
	shipTiers: [
		LogTier.CRITICAL,
		LogTier.OPERATIONAL,
		LogTier.LIFECYCLE,
		LogTier.DEBUG,
	],
	sampleDebugRate: 1,
};

/**
 * Pick the tier policy for an environment, keeping the configured level
 */
export function loggingConfigFor(env: string, level: string): LoggingConfig {
	const preset =
		env === "prod" ? PRODUCTION_LOGGING_CONFIG : LOCAL_LOGGING_CONFIG;
	return { ...preset, shipTiers: [...preset.shipTiers], level };
}

export function shouldForwardLog(
	tier: LogTier,
	config: LoggingConfig,
	traceId?: string,
): { forward: boolean; sampled?: boolean } {
	if (tier === LogTier.CRITICAL) {
		return { forward: true };
	}

	if (!config.shipTiers.includes(tier)) {
		return { forward: false };
	}

	if (tier === LogTier.DEBUG) {
		if (config.sampleDebugRate <= 0) {
			return { forward: false };
		}

		if (config.sampleDebugRate >= 1) {
			return { forward: true, sampled: true };
		}

		// Same trace, same decision
		const shouldSample = traceId
			? hashToRate(traceId) < config.sampleDebugRate
			: Math.random() < config.sampleDebugRate;

		return { forward: shouldSample, sampled: shouldSample };
	}

	return { forward: true };
}

function hashToRate(traceId: string): number {
	let hash = 0;
	for (let i = 0; i < traceId.length; i++) {
		hash = (hash << 5) - hash + traceId.charCodeAt(i);
		hash |= 0;
	}
	return Math.abs(hash) / 2147483647;
}
