export { type Check, type CheckPair, isWildcardCheck } from "./calldata/checks.js";
export { CHECK_ERRORS, type CheckErrorReason, CheckValidationError } from "./calldata/errors.js";
export { CheckRegistry, type CheckRegistryConfig } from "./calldata/registry.js";
export { CalldataValidator, type CheckMismatch, type ValidationResult } from "./calldata/validator.js";
export {
	CallRejectedError,
	type CallRejection,
	type ExecutionOutcome,
	type MetaCall,
	TimelockGate,
	type TimelockGateConfig,
} from "./gate/timelock.js";
export { AllowedSelectorsWhitelist, type SelectorWhitelist } from "./gate/whitelist.js";
export { applyWhitelist, buildTimelockGate, loadWhitelistFile } from "./service/whitelist.js";
export { TIMELOCK_ADMIN_FUNCTIONS } from "./types/abis.js";
export { createLogger, type LoggingConfig } from "./utils/logging.js";
