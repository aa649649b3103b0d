import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import type { CheckRegistry } from "../calldata/registry.js";
import { TimelockGate } from "../gate/timelock.js";
import { AllowedSelectorsWhitelist, type SelectorWhitelist } from "../gate/whitelist.js";
import { type WhitelistFile, whitelistFileSchema } from "../types/schemas.js";
import type { GateSettings } from "../utils/config.js";

export const loadWhitelistFile = (path: string): WhitelistFile => {
	// If this fails the whitelist definition is unusable and startup should abort
	const data = JSON.parse(readFileSync(path, "utf8"));
	return whitelistFileSchema.parse(data);
};

// Applies all checks of the whitelist as one batch, so either all or none are stored
export const applyWhitelist = (registry: CheckRegistry, whitelist: WhitelistFile): void => {
	const { checks } = whitelist;
	registry.addChecks(
		checks.map((entry) => entry.target),
		checks.map((entry) => entry.selector),
		checks.map((entry) => entry.startIndex),
		checks.map((entry) => entry.endIndex),
		checks.map((entry) => entry.data),
		checks.map((entry) => entry.isSelfAddressCheck),
	);
};

export const buildSelectorWhitelist = (whitelist: WhitelistFile): SelectorWhitelist | undefined =>
	whitelist.selectors === undefined ? undefined : new AllowedSelectorsWhitelist(whitelist.selectors);

export const buildTimelockGate = (settings: GateSettings, whitelist: WhitelistFile, logger?: Logger): TimelockGate => {
	const gate = new TimelockGate({
		address: settings.registry,
		executor: settings.executor,
		trustedOperator: settings.trustedOperator,
		selectorWhitelist: buildSelectorWhitelist(whitelist),
		logger,
	});
	applyWhitelist(gate.registry, whitelist);
	logger?.info({ pairs: gate.registry.pairs().length, checks: whitelist.checks.length }, "Loaded calldata whitelist");
	return gate;
};
