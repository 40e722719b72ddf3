import { describe, expect, it } from "vitest";
import {
	LOCAL_LOGGING_CONFIG,
	LogTier,
	type LoggingConfig,
	PRODUCTION_LOGGING_CONFIG,
	loggingConfigFor,
	shouldForwardLog,
} from "../log-tier.js";

describe("LogTier", () => {
	describe("shouldForwardLog", () => {
		it("should always forward CRITICAL logs", () => {
			const config: LoggingConfig = {
				level: "info",
				shipTiers: [],
				sampleDebugRate: 0,
			};

			const result = shouldForwardLog(LogTier.CRITICAL, config);
			expect(result.forward).toBe(true);
			expect(result.sampled).toBeUndefined();
		});

		it("should forward OPERATIONAL and LIFECYCLE logs in production", () => {
			expect(
				shouldForwardLog(LogTier.OPERATIONAL, PRODUCTION_LOGGING_CONFIG)
					.forward,
			).toBe(true);
			expect(
				shouldForwardLog(LogTier.LIFECYCLE, PRODUCTION_LOGGING_CONFIG).forward,
			).toBe(true);
		});

		it("should not forward a tier missing from shipTiers", () => {
			const config: LoggingConfig = {
				level: "info",
				shipTiers: [LogTier.CRITICAL],
				sampleDebugRate: 0,
			};

			expect(shouldForwardLog(LogTier.OPERATIONAL, config).forward).toBe(false);
		});

		it("should not forward DEBUG logs in production", () => {
			expect(
				shouldForwardLog(LogTier.DEBUG, PRODUCTION_LOGGING_CONFIG).forward,
			).toBe(false);
		});

		it("should forward all DEBUG logs locally", () => {
			const result = shouldForwardLog(LogTier.DEBUG, LOCAL_LOGGING_CONFIG);
			expect(result.forward).toBe(true);
			expect(result.sampled).toBe(true);
		});

		it("should sample DEBUG logs deterministically per trace", () => {
			const config: LoggingConfig = {
				level: "debug",
				shipTiers: [LogTier.DEBUG],
				sampleDebugRate: 0.5,
			};

			const first = shouldForwardLog(LogTier.DEBUG, config, "trace-abc");
			const second = shouldForwardLog(LogTier.DEBUG, config, "trace-abc");
			expect(first.forward).toBe(second.forward);
		});
	});

	describe("loggingConfigFor", () => {
		it("should use the production policy for prod", () => {
			const config = loggingConfigFor("prod", "warn");

			expect(config.level).toBe("warn");
			expect(config.shipTiers).toEqual(PRODUCTION_LOGGING_CONFIG.shipTiers);
			expect(config.sampleDebugRate).toBe(0);
		});

		it("should use the local policy elsewhere", () => {
			const config = loggingConfigFor("dev", "info");

			expect(config.level).toBe("info");
			expect(config.shipTiers).toContain(LogTier.DEBUG);
		});

		it("should not share tier arrays with the presets", () => {
			const config = loggingConfigFor("dev", "info");
			config.shipTiers.pop();

			expect(LOCAL_LOGGING_CONFIG.shipTiers).toHaveLength(4);
		});
	});
});
