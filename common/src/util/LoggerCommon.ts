import type { Logger as PinoLogger } from "pino";
import pino from "pino";

/**
 * Log level type - using pino's native levels
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Logging configuration interface
 */
export interface LoggingConfig {
	/**
	 * Whether logging is enabled. If false, a no-op logger will be returned.
	 */
	enabled: boolean;
	/**
	 * Default log level
	 */
	level: LogLevel;
	/**
	 * Module-specific log level overrides. Use the name of the file without extension as module name.
	 * Format: "module1:level1,module2:level2"
	 * Example: "SessionProbe:debug,LocalPreferenceStore:warn"
	 */
	moduleOverrides: Record<string, string | undefined>;
}

export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	// If there's an extension, remove it; otherwise return the whole name
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

/**
 * Create a logging configuration.
 *
 * @param enabled Whether logging is enabled. If false, a no-op logger will be returned.
 * @param level Default log level.
 * @param moduleOverrides Module-specific log level overrides in the format "module1:level1,module2:level2"
 * @returns Logging configuration object
 */
export function createLoggingConfig(enabled: boolean, level: LogLevel, moduleOverrides: string): LoggingConfig {
	const overrides: Record<string, string> = {};
	if (moduleOverrides) {
		const pairs = moduleOverrides.split(",");
		for (const pair of pairs) {
			const [module, lvl] = pair.split(":");
			if (module && lvl) {
				overrides[module.trim()] = lvl.trim();
			}
		}
	}
	return {
		enabled,
		level,
		moduleOverrides: overrides,
	};
}

/**
 * Configures logging based on environment variables.
 * The supported environment variables are:
 * - DISABLE_LOGGING: Set to "true" to disable logging entirely (returns no-op logger).
 * - LOG_LEVEL: Default log level. If not provided, defaults to "info".
 * - LOG_LEVEL_OVERRIDES: module-specific log level overrides, e.g. "RemotePreferenceStore:debug,Client:error"
 *
 * @returns Logging configuration object
 */
function getLoggingConfig(): LoggingConfig {
	const enabled = process.env.DISABLE_LOGGING !== "true";
	const envLevel = process.env.LOG_LEVEL ?? "";
	const level = isValidLogLevel(envLevel) ? envLevel : "info";
	const moduleOverrides = process.env.LOG_LEVEL_OVERRIDES ?? "";
	return createLoggingConfig(enabled, level, moduleOverrides);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	return pino({
		level: config.level,
	});
}

/**
 * Validate that a string is a valid LogLevel.
 * @param level - The string to validate
 * @returns True if valid, false otherwise
 */
export function isValidLogLevel(level: string): level is LogLevel {
	return ["trace", "debug", "info", "warn", "error", "fatal"].includes(level);
}

function validateLogLevel(logName: string, logLevel: string | undefined): LogLevel | undefined {
	if (!logName || !logLevel) {
		return;
	}
	const level = logLevel.toLowerCase();
	if (!isValidLogLevel(level)) {
		// biome-ignore lint/suspicious/noConsole: needed to fix logging mistakes.
		console.log(`Unable to set ${logName} log level to ${logLevel} as it is an invalid value`);
		return;
	}
	return level;
}

// Helper to get the more verbose (lower priority number) level
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const levels = pino.levels.values;
	return levels[level1] < levels[level2] ? level1 : level2;
}

// Create a child logger for a specific module with optional level override
function createModuleLogger(
	moduleName: string,
	loggingConfig: LoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const childLevel = validateLogLevel(moduleName, loggingConfig.moduleOverrides[moduleName]);

	// A module override more verbose than the base level needs a parent that accepts it
	const effectiveLevel = childLevel ?? loggingConfig.level;
	const parentLevel = getMinimumLevel(effectiveLevel, loggingConfig.level);

	const logger = defaultLoggerProvider({ ...loggingConfig, level: parentLevel });
	return logger.child({ module: moduleName }, { level: effectiveLevel });
}

// Type alias for compatibility
export type Logger = PinoLogger;

/**
 * Create a no-op logger that does nothing.
 * Used when logging is disabled.
 */
function createNoOpLogger(): Logger {
	const noop = () => {
		// Intentionally empty - no-op logger does nothing
	};
	const noopLogger = {
		trace: noop,
		debug: noop,
		info: noop,
		warn: noop,
		error: noop,
		fatal: noop,
		child: () => noopLogger,
		level: "silent",
		silent: noop,
		isLevelEnabled: () => false,
	} as unknown as Logger;
	return noopLogger;
}

// Singleton no-op logger instance
let noopLoggerInstance: Logger | undefined;

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `createLog(import.meta)` near the top of the file (after imports).
 *
 * If the logging config has enabled=false, a no-op logger is returned.
 *
 * @param module the module meta or module name
 * @param loggingConfigProvider an optional logging config provider to use instead of the default one.
 * @param defaultLoggerProvider an optional default logger provider to use instead of the default one.
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider?: () => LoggingConfig,
	defaultLoggerProvider?: (config: LoggingConfig) => PinoLogger,
): Logger {
	const config = (loggingConfigProvider ?? getLoggingConfig)();

	if (!config.enabled) {
		if (!noopLoggerInstance) {
			noopLoggerInstance = createNoOpLogger();
		}
		return noopLoggerInstance;
	}

	return createModuleLogger(getModuleName(module), config, defaultLoggerProvider ?? createDefaultLogger);
}
