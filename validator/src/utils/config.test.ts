import { describe, expect, it } from "vitest";
import { EXECUTOR, OPERATOR, REGISTRY } from "../__tests__/data/checks.js";
import { loadGateSettings } from "./config.js";

const ENV = {
	REGISTRY_ADDRESS: REGISTRY,
	TRUSTED_OPERATOR_ADDRESS: OPERATOR,
	EXECUTOR_ADDRESS: EXECUTOR,
	WHITELIST_PATH: "whitelist.json",
};

describe("loadGateSettings", () => {
	it("should apply logging defaults", () => {
		expect(loadGateSettings(ENV)).toStrictEqual({
			registry: REGISTRY,
			trustedOperator: OPERATOR,
			executor: EXECUTOR,
			whitelistPath: "whitelist.json",
			logging: { level: "info", pretty: false },
		});
	});

	it("should use configured logging", () => {
		const settings = loadGateSettings({ ...ENV, LOG_LEVEL: "debug", LOG_PRETTY: "1" });
		expect(settings.logging).toStrictEqual({ level: "debug", pretty: true });
	});

	it("should checksum addresses", () => {
		const settings = loadGateSettings({ ...ENV, REGISTRY_ADDRESS: "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd" });
		expect(settings.registry.toLowerCase()).toBe("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd");
		expect(settings.registry).not.toBe("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd");
	});

	it("should reject invalid addresses", () => {
		expect(() => loadGateSettings({ ...ENV, EXECUTOR_ADDRESS: "0x1234" })).toThrow();
	});

	it("should require a whitelist path", () => {
		const { WHITELIST_PATH: _, ...env } = ENV;
		expect(() => loadGateSettings(env)).toThrow();
	});
});
