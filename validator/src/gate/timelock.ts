import type { Logger } from "pino";
import { type Address, decodeFunctionData, getAddress, type Hex, isAddressEqual, toFunctionSelector } from "viem";
import { extractSelector } from "../calldata/checks.js";
import { CheckRegistry } from "../calldata/registry.js";
import { CalldataValidator, type ValidationResult } from "../calldata/validator.js";
import { TIMELOCK_ADMIN_FUNCTIONS } from "../types/abis.js";
import { formatError } from "../utils/errors.js";
import type { SelectorWhitelist } from "./whitelist.js";

export type MetaCall = {
	to: Address;
	data: Hex;
};

export type AdminFunctionName = (typeof TIMELOCK_ADMIN_FUNCTIONS)[number]["name"];

export type ExecutionOutcome =
	| {
			kind: "admin";
			functionName: AdminFunctionName;
	  }
	| {
			kind: "external";
			checkIndex: number;
	  };

export type CallRejection = "UNAUTHORIZED" | "SELECTOR_NOT_WHITELISTED" | "CALLDATA_MISMATCH" | "UNSUPPORTED_ADMIN_CALL";

export class CallRejectedError extends Error {
	readonly reason: CallRejection;
	readonly result?: ValidationResult;

	constructor(reason: CallRejection, message: string, result?: ValidationResult) {
		super(message);
		this.name = "CallRejectedError";
		this.reason = reason;
		this.result = result;
	}
}

export type TimelockGateConfig = {
	address: Address;
	executor: Address;
	trustedOperator: Address;
	selectorWhitelist?: SelectorWhitelist;
	logger?: Logger;
};

const ADMIN_SELECTORS = TIMELOCK_ADMIN_FUNCTIONS.map((item) => toFunctionSelector(item));

/**
 * Entry point of the executor. Calls to the gate itself manage the calldata
 * checks, every other call has to pass the selector whitelist (if configured)
 * and match one of the stored calldata checks.
 */
export class TimelockGate {
	#registry: CheckRegistry;
	#validator: CalldataValidator;
	#executor: Address;
	#selectorWhitelist?: SelectorWhitelist;
	#logger?: Logger;

	constructor({ address, executor, trustedOperator, selectorWhitelist, logger }: TimelockGateConfig) {
		this.#registry = new CheckRegistry({ address, trustedOperator, logger });
		this.#validator = new CalldataValidator(this.#registry, address);
		this.#executor = getAddress(executor);
		this.#selectorWhitelist = selectorWhitelist;
		this.#logger = logger;
	}

	get registry(): CheckRegistry {
		return this.#registry;
	}

	get validator(): CalldataValidator {
		return this.#validator;
	}

	execute(caller: Address, call: MetaCall): ExecutionOutcome {
		if (!isAddressEqual(caller, this.#executor)) {
			throw new CallRejectedError("UNAUTHORIZED", "caller is not the executor");
		}
		if (isAddressEqual(call.to, this.#registry.address)) {
			try {
				return { kind: "admin", functionName: this.#applyAdminCall(call.data) };
			} catch (err) {
				this.#logger?.warn({ error: formatError(err) }, "Admin call failed");
				throw err;
			}
		}
		return { kind: "external", checkIndex: this.checkCall(call) };
	}

	/**
	 * Throws a {@link CallRejectedError} if the call is not allowed, otherwise
	 * returns the index of the matching check.
	 */
	checkCall(call: MetaCall): number {
		const selector = extractSelector(call.data);
		if (selector !== undefined && this.#selectorWhitelist?.isAllowed(call.to, selector) === false) {
			this.#logger?.warn({ target: call.to, selector }, "Rejected call to selector that is not whitelisted");
			throw new CallRejectedError("SELECTOR_NOT_WHITELISTED", "selector not whitelisted");
		}
		const result = this.#validator.inspect(call.to, call.data);
		if (result.status === "invalid") {
			this.#logger?.warn(
				{ target: call.to, selector: result.selector, reason: result.reason, mismatches: result.mismatches },
				"Rejected call with unexpected calldata",
			);
			throw new CallRejectedError("CALLDATA_MISMATCH", "calldata does not match any check", result);
		}
		return result.checkIndex;
	}

	#applyAdminCall(data: Hex): AdminFunctionName {
		const selector = extractSelector(data);
		if (selector === undefined || !ADMIN_SELECTORS.includes(selector)) {
			throw new CallRejectedError("UNSUPPORTED_ADMIN_CALL", `unsupported admin call ${selector ?? data}`);
		}
		const decoded = decodeFunctionData({ abi: TIMELOCK_ADMIN_FUNCTIONS, data });
		switch (decoded.functionName) {
			case "addCalldataCheck":
				this.#registry.addCheck(...decoded.args);
				break;
			case "addCalldataChecks":
				this.#registry.addChecks(...decoded.args);
				break;
			case "removeCalldataCheck": {
				const [target, checkSelector, index] = decoded.args;
				this.#registry.removeCheck(target, checkSelector, Number(index));
				break;
			}
		}
		this.#logger?.info({ functionName: decoded.functionName }, "Applied admin call");
		return decoded.functionName;
	}
}
