import { Injectable, type OnApplicationShutdown } from "@nestjs/common";
import type { LoggerService } from "../telemetry/logger.service.js";
import type { TelemetryService } from "../telemetry/telemetry.service.js";

export type ShutdownSignal = "SIGTERM" | "SIGINT";

const SIGNAL_NUMBERS: Record<ShutdownSignal, number> = {
	SIGINT: 2,
	SIGTERM: 15,
};

export interface LifecycleOptions {
	/**
	 * When set, the first signal only raises the shutdown flag for loops that
	 * poll it; a second one exits. Otherwise the first signal exits.
	 */
	graceful: boolean;
}

export type ExitFn = (code: number) => void;

@Injectable()
export class LifecycleService implements OnApplicationShutdown {
	private shutdownSignal: ShutdownSignal | undefined;

	constructor(
		private readonly logger: LoggerService,
		private readonly telemetry: TelemetryService,
		private readonly options: LifecycleOptions = { graceful: true },
		private readonly proc: NodeJS.EventEmitter = process,
		private readonly exit: ExitFn = (code) => process.exit(code),
	) {
		this.proc.on("SIGTERM", () => this.handleSignal("SIGTERM"));
		this.proc.on("SIGINT", () => this.handleSignal("SIGINT"));
		this.proc.on("unhandledRejection", (reason: unknown) =>
			this.handleUnhandledRejection(reason),
		);
	}

	/**
	 * Long-running loops poll this to stop at a safe point
	 */
	isShutdownInProgress(): boolean {
		return this.shutdownSignal !== undefined;
	}

	onApplicationShutdown(signal?: string): void {
		this.logger.lifecycle("Shutdown completed", {
			signal: signal ?? this.shutdownSignal ?? "none",
		});
	}

	private handleSignal(signal: ShutdownSignal): void {
		this.telemetry.increment("process.signal_received", 1, { signal });

		if (this.options.graceful && this.shutdownSignal === undefined) {
			this.shutdownSignal = signal;
			this.logger.lifecycle("Shutdown requested", { signal });
			return;
		}

		this.logger.lifecycle("Exiting on signal", { signal });
		this.logger.flush();
		this.exit(128 + SIGNAL_NUMBERS[signal]);
	}

	private handleUnhandledRejection(reason: unknown): void {
		const message = reason instanceof Error ? reason.message : String(reason);
		const stack = reason instanceof Error ? reason.stack : undefined;

		this.logger.error("Unhandled rejection", stack, message);
		this.telemetry.increment("process.unhandled_rejection");
		process.exitCode = 1;
	}
}
