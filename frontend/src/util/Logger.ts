import { createLog, createLoggingConfig, isValidLogLevel, type Logger, type LoggingConfig } from "mailhub-common";
import pino, { type Logger as PinoLogger } from "pino";

/**
 * Configures browser-side logging based on local storage settings.
 * The supported local storage keys are:
 * - DISABLE_LOGGING: Set to "true" to disable logging entirely (returns no-op logger).
 * - LOG_LEVEL: Default log level. If not provided, defaults to "info".
 * - LOG_LEVEL_OVERRIDES: module-specific log level overrides, e.g. "SessionProbe:debug,PreferenceCoordinator:warn"
 *
 * Logging is always disabled while tests run.
 *
 * @returns Logging configuration object
 */
export function getBrowserLoggingConfig(): LoggingConfig {
	const enabled = process.env.NODE_ENV !== "test" && readSetting("DISABLE_LOGGING") !== "true";
	const storedLevel = readSetting("LOG_LEVEL") ?? "info";
	const level = isValidLogLevel(storedLevel) ? storedLevel : "info";
	const moduleOverrides = readSetting("LOG_LEVEL_OVERRIDES") ?? "";
	return createLoggingConfig(enabled, level, moduleOverrides);
}

// Storage access throws in sandboxed frames and with storage disabled
function readSetting(key: string): string | undefined {
	try {
		return localStorage.getItem(key) ?? undefined;
	} catch {
		return;
	}
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	return pino({
		level: config.level,
		browser: {
			asObject: true,
		},
	});
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `getLog(import.meta)` near the top of the file (after imports).
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
	return createLog(module, getBrowserLoggingConfig, createDefaultLogger);
}
