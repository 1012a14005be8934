import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as core from "../index";
import { createLogger } from "./logger";

const ENV_KEYS = ["LOG_LEVEL", "LOG_MODULE", "LOG_JSON", "LOG_PRETTY", "NODE_ENV"];
const saved: Record<string, string | undefined> = {};

describe("createLogger", () => {
	beforeEach(() => {
		for (const key of ENV_KEYS) {
			saved[key] = process.env[key];
			delete process.env[key];
		}
	});

	afterEach(() => {
		for (const key of ENV_KEYS) {
			const value = saved[key];
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}
		vi.restoreAllMocks();
	});

	it("writes one JSON line per event tagged with the module", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		createLogger("snapshot").info("instrument_ready", {
			ticker: "AAA",
			ts: "2025-01-01T00:00:00.000Z",
		});
		expect(spy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
			ts: "2025-01-01T00:00:00.000Z",
			level: "info",
			event: "instrument_ready",
			module: "snapshot",
			ticker: "AAA",
		});
	});

	it("honours LOG_LEVEL and LOG_MODULE", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		process.env.LOG_LEVEL = "warn";
		createLogger("snapshot").info("hidden");
		process.env.LOG_LEVEL = "debug";
		process.env.LOG_MODULE = "data";
		createLogger("snapshot").debug("filtered");
		createLogger("data").debug("shown");
		expect(spy).toHaveBeenCalledTimes(1);
		expect(String(spy.mock.calls[0][0])).toContain('"event":"shown"');
	});

	it("is the only logging entry point the core package exports", () => {
		const freeFunctions = Object.keys(core).filter((key) =>
			/^(log|debug|info|warn|error)$/.test(key)
		);
		expect(freeFunctions).toEqual([]);
		expect("getWorkspaceRoot" in core).toBe(false);
		expect("WEEK_MS" in core).toBe(false);
	});
});
