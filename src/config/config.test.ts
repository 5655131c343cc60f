import { describe, expect, it } from "vitest";
import {
	DEFAULT_MONITOR_CONFIG,
	loadMonitorConfigFromEnv,
	resolveMonitorConfig,
} from "./config";

describe("resolveMonitorConfig", () => {
	it("returns the defaults for empty input", () => {
		expect(resolveMonitorConfig()).toEqual({
			address: undefined,
			timeoutMs: 10000,
			pollIntervalMs: 10000,
			retryDelayMs: 2500,
			scanTimeoutMs: 5000,
			connectionTimeoutMs: 20000,
		});
		expect(resolveMonitorConfig()).toEqual(DEFAULT_MONITOR_CONFIG);
	});

	it("parses the address", () => {
		expect(resolveMonitorConfig({ address: "c0:ff:ee:00:00:01" }).address).toBe(
			0xc0ffee000001,
		);
	});

	it("keeps overrides", () => {
		const config = resolveMonitorConfig({ timeoutMs: 1000, pollIntervalMs: 100 });
		expect(config.timeoutMs).toBe(1000);
		expect(config.pollIntervalMs).toBe(100);
	});

	it("rejects an invalid address", () => {
		expect(() => resolveMonitorConfig({ address: "nope" })).toThrow(
			"Invalid Bluetooth address: nope",
		);
	});

	it.each([
		["timeoutMs", { timeoutMs: 0 }],
		["pollIntervalMs", { pollIntervalMs: -1 }],
		["retryDelayMs", { retryDelayMs: Number.NaN }],
		["scanTimeoutMs", { scanTimeoutMs: Number.POSITIVE_INFINITY }],
	])("rejects a non-positive %s", (name, input) => {
		expect(() => resolveMonitorConfig(input)).toThrow(
			`${name} must be a positive number`,
		);
	});
});

describe("loadMonitorConfigFromEnv", () => {
	it("falls back to defaults when nothing is set", () => {
		expect(loadMonitorConfigFromEnv({})).toEqual(DEFAULT_MONITOR_CONFIG);
	});

	it("reads every variable", () => {
		const config = loadMonitorConfigFromEnv({
			HEART_RATE_ADDRESS: "c0ffee000001",
			HEART_RATE_TIMEOUT_MS: "15000",
			HEART_RATE_POLL_INTERVAL_MS: " 500 ",
		});

		expect(config.address).toBe(0xc0ffee000001);
		expect(config.timeoutMs).toBe(15000);
		expect(config.pollIntervalMs).toBe(500);
	});

	it("treats blank variables as unset", () => {
		const config = loadMonitorConfigFromEnv({
			HEART_RATE_ADDRESS: "  ",
			HEART_RATE_TIMEOUT_MS: "",
		});

		expect(config.address).toBeUndefined();
		expect(config.timeoutMs).toBe(10000);
	});

	it("rejects a non-numeric duration", () => {
		expect(() =>
			loadMonitorConfigFromEnv({ HEART_RATE_TIMEOUT_MS: "soon" }),
		).toThrow('HEART_RATE_TIMEOUT_MS must be a number, got "soon"');
	});
});
