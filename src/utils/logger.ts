import {
	configure,
	getConsoleSink,
	getLogger,
	type Logger,
	type LogLevel,
} from "@logtape/logtape";
import { z } from "zod";

/**
 * Centralized logger configuration for netlayer
 *
 * Creates a hierarchical logger structure:
 * - netlayer (root)
 *   - http (live executor)
 *   - mock (fixture dispatcher)
 *   - fixture (fixture file loading)
 *   - factory (client selection, configuration decoding)
 *   - cli
 */

const LogLevelSchema = z.enum([
	"trace",
	"debug",
	"info",
	"warning",
	"error",
	"fatal",
]);

let isConfigured = false;

/**
 * Normalize a user-supplied level name ("WARN", "debug", ...) to a LogTape level.
 * Returns undefined for anything LogTape does not know.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (!value) {
		return undefined;
	}
	const lowered = value.trim().toLowerCase();
	const result = LogLevelSchema.safeParse(
		lowered === "warn" ? "warning" : lowered,
	);
	return result.success ? result.data : undefined;
}

/**
 * Configure LogTape with the specified log level
 * This function should be called only once, early in the application lifecycle
 */
export async function configureLogger(level: LogLevel = "info"): Promise<void> {
	if (isConfigured) {
		return;
	}

	await configure({
		sinks: {
			console: getConsoleSink(),
		},
		loggers: [
			{
				category: "netlayer",
				lowestLevel: level,
				sinks: ["console"],
			},
			{
				category: ["logtape", "meta"],
				lowestLevel: "warning", // Suppress info-level meta logger messages
				sinks: ["console"],
			},
		],
	});

	isConfigured = true;
}

let rootLogger: Logger | undefined;

/**
 * Get the root logger instance (call this after configureLogger)
 */
export function getRootLogger(): Logger {
	if (!rootLogger) {
		rootLogger = getLogger(["netlayer"]);
	}
	return rootLogger;
}

export const httpLogger = getLogger(["netlayer", "http"]);
export const mockLogger = getLogger(["netlayer", "mock"]);
export const fixtureLogger = getLogger(["netlayer", "fixture"]);
export const factoryLogger = getLogger(["netlayer", "factory"]);
export const cliLogger = getLogger(["netlayer", "cli"]);

/**
 * Called when --verbose is detected; LogTape is already configured at debug
 * level by then, so this only confirms it.
 */
export function enableVerboseLogging(): void {
	getRootLogger().info("Verbose logging enabled.");
}
