import { type Address, getAddress, type Hex, pad, size, slice } from "viem";
import { type Check, extractSelector, isWildcardCheck } from "./checks.js";
import type { CheckRegistry } from "./registry.js";

const ADDRESS_SIZE = 20;

export type CheckMismatch = {
	checkIndex: number;
	startIndex: number;
	endIndex: number;
	// Not set if the payload ends before the checked range
	actual?: Hex;
};

export type ValidationResult =
	| {
			status: "valid";
			selector: Hex;
			checkIndex: number;
	  }
	| {
			status: "invalid";
			reason: "malformed_payload" | "no_checks" | "no_match";
			selector?: Hex;
			mismatches: CheckMismatch[];
	  };

export class CalldataValidator {
	#registry: CheckRegistry;
	#address: Address;

	constructor(registry: CheckRegistry, address: Address) {
		this.#registry = registry;
		this.#address = getAddress(address);
	}

	isValid(target: Address, payload: Hex): boolean {
		return this.inspect(target, payload).status === "valid";
	}

	inspect(target: Address, payload: Hex): ValidationResult {
		const selector = extractSelector(payload);
		if (selector === undefined) {
			return { status: "invalid", reason: "malformed_payload", mismatches: [] };
		}
		const checks = this.#registry.getChecks(target, selector);
		if (checks.length === 0) {
			return { status: "invalid", reason: "no_checks", selector, mismatches: [] };
		}
		const payloadSize = size(payload);
		const mismatches: CheckMismatch[] = [];
		for (const [checkIndex, check] of checks.entries()) {
			const { startIndex, endIndex } = check;
			if (isWildcardCheck(check)) {
				return { status: "valid", selector, checkIndex };
			}
			if (payloadSize < endIndex) {
				mismatches.push({ checkIndex, startIndex, endIndex });
				continue;
			}
			const actual = slice(payload, startIndex, endIndex, { strict: true }).toLowerCase() as Hex;
			if (this.#matchesCandidate(check, actual)) {
				return { status: "valid", selector, checkIndex };
			}
			mismatches.push({ checkIndex, startIndex, endIndex, actual });
		}
		return { status: "invalid", reason: "no_match", selector, mismatches };
	}

	#matchesCandidate(check: Check, actual: Hex): boolean {
		const width = check.endIndex - check.startIndex;
		return check.data.some((data, i) => {
			if (check.isSelfAddressCheck[i]) {
				const expected = this.#selfAddressValue(width);
				return expected !== undefined && expected === actual;
			}
			return data.toLowerCase() === actual;
		});
	}

	// The address is right aligned in the checked range, like an abi encoded address in a 32 byte slot
	#selfAddressValue(width: number): Hex | undefined {
		if (width < ADDRESS_SIZE) return undefined;
		return pad(this.#address, { size: width }).toLowerCase() as Hex;
	}
}
