import type { Address } from "viem";
import { validatorConfigSchema } from "../types/schemas.js";
import type { LoggingConfig } from "./logging.js";

export type GateSettings = {
	registry: Address;
	trustedOperator: Address;
	executor: Address;
	whitelistPath: string;
	logging: Required<LoggingConfig>;
};

const DEFAULT_LOGGING: Required<LoggingConfig> = {
	level: "info",
	pretty: false,
};

export const loadGateSettings = (env: Record<string, string | undefined>): GateSettings => {
	const config = validatorConfigSchema.parse(env);
	return {
		registry: config.REGISTRY_ADDRESS,
		trustedOperator: config.TRUSTED_OPERATOR_ADDRESS,
		executor: config.EXECUTOR_ADDRESS,
		whitelistPath: config.WHITELIST_PATH,
		logging: {
			level: config.LOG_LEVEL ?? DEFAULT_LOGGING.level,
			pretty: config.LOG_PRETTY ?? DEFAULT_LOGGING.pretty,
		},
	};
};
