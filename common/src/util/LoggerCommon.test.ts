import type { Logger } from "pino";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

// Mock pino
vi.mock("pino", () => {
	const createMockLogger = () => ({
		child: vi.fn((_bindings, options) => ({
			...createMockLogger(),
			level: options?.level,
		})),
		info: vi.fn(),
		debug: vi.fn(),
		error: vi.fn(),
		warn: vi.fn(),
		fatal: vi.fn(),
		trace: vi.fn(),
		level: "info",
	});

	const levels = {
		values: {
			trace: 10,
			debug: 20,
			info: 30,
			warn: 40,
			error: 50,
			fatal: 60,
		},
	};

	return {
		default: Object.assign(
			vi.fn(() => createMockLogger()),
			{ levels },
		),
		levels,
	};
});

function createProviderLogger() {
	const child = vi.fn((_bindings: object, options: { level: string }) => ({ level: options.level }));
	const logger = { child } as unknown as Logger;
	return { child, logger, provider: vi.fn(() => logger) };
}

describe("LoggerCommon", () => {
	beforeEach(() => {
		vi.resetModules();
		vi.clearAllMocks();
		delete process.env.DISABLE_LOGGING;
		delete process.env.LOG_LEVEL;
		delete process.env.LOG_LEVEL_OVERRIDES;
	});

	afterEach(() => {
		delete process.env.DISABLE_LOGGING;
		delete process.env.LOG_LEVEL;
		delete process.env.LOG_LEVEL_OVERRIDES;
	});

	describe("getModuleName", () => {
		it("should strip the directory and extension from a URL", async () => {
			const { getModuleName } = await import("./LoggerCommon");

			expect(getModuleName("file:///src/services/preferences/SessionProbe.ts")).toBe("SessionProbe");
		});

		it("should accept an ImportMeta", async () => {
			const { getModuleName } = await import("./LoggerCommon");
			const meta = { url: "http://localhost:5173/src/util/CookieUtil.ts?t=123" } as ImportMeta;

			expect(getModuleName(meta)).toBe("CookieUtil");
		});

		it("should keep inner dots and names without extension", async () => {
			const { getModuleName } = await import("./LoggerCommon");

			expect(getModuleName("/a/Remote.store.ts")).toBe("Remote.store");
			expect(getModuleName("Coordinator")).toBe("Coordinator");
		});
	});

	describe("createLoggingConfig", () => {
		it("should parse module overrides", async () => {
			const { createLoggingConfig } = await import("./LoggerCommon");

			const config = createLoggingConfig(true, "warn", " SessionProbe : debug ,Client:error,broken,:info");

			expect(config).toEqual({
				enabled: true,
				level: "warn",
				moduleOverrides: { SessionProbe: "debug", Client: "error" },
			});
		});

		it("should accept an empty override string", async () => {
			const { createLoggingConfig } = await import("./LoggerCommon");

			expect(createLoggingConfig(false, "info", "").moduleOverrides).toEqual({});
		});
	});

	describe("isValidLogLevel", () => {
		it("should accept pino levels only", async () => {
			const { isValidLogLevel } = await import("./LoggerCommon");

			expect(isValidLogLevel("trace")).toBe(true);
			expect(isValidLogLevel("fatal")).toBe(true);
			expect(isValidLogLevel("verbose")).toBe(false);
			expect(isValidLogLevel("")).toBe(false);
		});
	});

	describe("createLog", () => {
		it("should create a module child logger at the configured level", async () => {
			const { createLog, createLoggingConfig } = await import("./LoggerCommon");
			const { child, provider } = createProviderLogger();

			const logger = createLog("LocalPreferenceStore", () => createLoggingConfig(true, "info", ""), provider);

			expect(logger.level).toBe("info");
			expect(provider).toHaveBeenCalledWith(expect.objectContaining({ level: "info" }));
			expect(child).toHaveBeenCalledWith({ module: "LocalPreferenceStore" }, { level: "info" });
		});

		it("should lower the parent level when a module override is more verbose", async () => {
			const { createLog, createLoggingConfig } = await import("./LoggerCommon");
			const { child, provider } = createProviderLogger();

			createLog("SessionProbe", () => createLoggingConfig(true, "info", "SessionProbe:DEBUG"), provider);

			expect(provider).toHaveBeenCalledWith(expect.objectContaining({ level: "debug" }));
			expect(child).toHaveBeenCalledWith({ module: "SessionProbe" }, { level: "debug" });
		});

		it("should keep the parent level when a module override is less verbose", async () => {
			const { createLog, createLoggingConfig } = await import("./LoggerCommon");
			const { child, provider } = createProviderLogger();

			createLog("Client", () => createLoggingConfig(true, "info", "Client:error"), provider);

			expect(provider).toHaveBeenCalledWith(expect.objectContaining({ level: "info" }));
			expect(child).toHaveBeenCalledWith({ module: "Client" }, { level: "error" });
		});

		it("should ignore an invalid module override", async () => {
			const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
			const { createLog, createLoggingConfig } = await import("./LoggerCommon");
			const { child, provider } = createProviderLogger();

			createLog("Client", () => createLoggingConfig(true, "warn", "Client:loud"), provider);

			expect(child).toHaveBeenCalledWith({ module: "Client" }, { level: "warn" });
			expect(consoleSpy).toHaveBeenCalledWith("Unable to set Client log level to loud as it is an invalid value");
		});

		it("should return the shared no-op logger when disabled", async () => {
			const { createLog, createLoggingConfig } = await import("./LoggerCommon");
			const { provider } = createProviderLogger();
			const disabled = () => createLoggingConfig(false, "info", "");

			const first = createLog("A", disabled, provider);
			const second = createLog("B", disabled, provider);

			expect(first).toBe(second);
			expect(first.child({})).toBe(first);
			expect(first.isLevelEnabled("error")).toBe(false);
			expect(() => first.warn("ignored")).not.toThrow();
			expect(provider).not.toHaveBeenCalled();
		});

		it("should read the level from the environment by default", async () => {
			process.env.LOG_LEVEL = "warn";
			const pino = await import("pino");
			const { createLog } = await import("./LoggerCommon");

			const logger = createLog("EnvModule");

			expect(pino.default).toHaveBeenCalledWith({ level: "warn" });
			expect(logger.level).toBe("warn");
		});

		it("should default to info for an unknown environment level", async () => {
			process.env.LOG_LEVEL = "chatty";
			const pino = await import("pino");
			const { createLog } = await import("./LoggerCommon");

			createLog("EnvModule");

			expect(pino.default).toHaveBeenCalledWith({ level: "info" });
		});

		it("should apply environment module overrides", async () => {
			process.env.LOG_LEVEL_OVERRIDES = "EnvModule:trace";
			const { createLog } = await import("./LoggerCommon");

			expect(createLog("EnvModule").level).toBe("trace");
		});

		it("should disable logging from the environment", async () => {
			process.env.DISABLE_LOGGING = "true";
			const pino = await import("pino");
			const { createLog } = await import("./LoggerCommon");

			const logger = createLog("EnvModule");

			expect(logger.level).toBe("silent");
			expect(pino.default).not.toHaveBeenCalled();
		});
	});
});
