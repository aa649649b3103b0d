import type { Logger } from "pino";
import { type Address, getAddress, type Hex } from "viem";
import {
	type Check,
	type CheckPair,
	copyCheck,
	ensureWildcardExclusivity,
	isWildcardCheck,
	normalizeSelector,
	type PairKey,
	pairKey,
	validateCheck,
} from "./checks.js";
import { CheckValidationError } from "./errors.js";

export type CheckRegistryConfig = {
	// Address of the contract owning the registry, never a valid target
	address: Address;
	trustedOperator: Address;
	logger?: Logger;
};

export type CheckEntry = CheckPair & {
	check: Check;
};

type StoredPair = CheckPair & {
	checks: Check[];
};

/**
 * Stores the calldata checks per (target, selector) pair.
 *
 * The registry does not authorize callers, every mutation is expected to come
 * from the executor. Removal swaps the removed check with the last one, so
 * indices refer to the current storage order and change after every removal
 * on the same pair.
 */
export class CheckRegistry {
	#address: Address;
	#trustedOperator: Address;
	#logger?: Logger;
	#pairs = new Map<PairKey, StoredPair>();

	constructor({ address, trustedOperator, logger }: CheckRegistryConfig) {
		this.#address = getAddress(address);
		this.#trustedOperator = getAddress(trustedOperator);
		this.#logger = logger;
	}

	get address(): Address {
		return this.#address;
	}

	get trustedOperator(): Address {
		return this.#trustedOperator;
	}

	addCheck(
		target: Address,
		selector: Hex,
		startIndex: number,
		endIndex: number,
		data: readonly Hex[],
		isSelfAddressCheck: readonly boolean[],
	): void {
		this.#apply([
			{
				target,
				selector,
				check: { startIndex, endIndex, data: [...data], isSelfAddressCheck: [...isSelfAddressCheck] },
			},
		]);
	}

	addChecks(
		targets: readonly Address[],
		selectors: readonly Hex[],
		startIndexes: readonly number[],
		endIndexes: readonly number[],
		datas: readonly (readonly Hex[])[],
		isSelfAddressChecks: readonly (readonly boolean[])[],
	): void {
		const length = targets.length;
		const lengths = [selectors, startIndexes, endIndexes, datas, isSelfAddressChecks].map((array) => array.length);
		if (lengths.some((other) => other !== length)) {
			throw new CheckValidationError("ARITY_MISMATCH");
		}
		this.#apply(
			targets.map((target, i) => ({
				target,
				selector: selectors[i],
				check: {
					startIndex: startIndexes[i],
					endIndex: endIndexes[i],
					data: [...datas[i]],
					isSelfAddressCheck: [...isSelfAddressChecks[i]],
				},
			})),
		);
	}

	removeCheck(target: Address, selector: Hex, index: number): void {
		const key = pairKey(target, selector);
		const stored = this.#pairs.get(key);
		if (stored === undefined) throw new CheckValidationError("NO_CHECKS");
		const checks = stored.checks;
		if (!Number.isInteger(index) || index < 0 || index >= checks.length) {
			throw new CheckValidationError("INDEX_OUT_OF_BOUNDS");
		}
		checks[index] = checks[checks.length - 1];
		checks.pop();
		if (checks.length === 0) this.#pairs.delete(key);
		this.#logger?.debug({ target: stored.target, selector: stored.selector, index }, "Removed calldata check");
	}

	getChecks(target: Address, selector: Hex): Check[] {
		const stored = this.#pairs.get(pairKey(target, selector));
		return stored?.checks.map(copyCheck) ?? [];
	}

	hasWildcard(target: Address, selector: Hex): boolean {
		return this.#pairs.get(pairKey(target, selector))?.checks.some(isWildcardCheck) ?? false;
	}

	pairs(): CheckPair[] {
		return Array.from(this.#pairs.values(), ({ target, selector }) => ({ target, selector }));
	}

	// Validates all entries against a staged copy and only commits if every entry passed
	#apply(entries: readonly CheckEntry[]): void {
		const staged = new Map<PairKey, StoredPair>();
		for (const { target, selector, check } of entries) {
			validateCheck(target, check, { registry: this.#address, trustedOperator: this.#trustedOperator });
			const key = pairKey(target, selector);
			const current = staged.get(key) ?? this.#copyPair(key, target, selector);
			ensureWildcardExclusivity(current.checks, check);
			current.checks.push(copyCheck(check));
			staged.set(key, current);
		}
		for (const [key, stored] of staged) {
			this.#pairs.set(key, stored);
			this.#logger?.debug(
				{ target: stored.target, selector: stored.selector, count: stored.checks.length },
				"Stored calldata checks",
			);
		}
	}

	#copyPair(key: PairKey, target: Address, selector: Hex): StoredPair {
		const stored = this.#pairs.get(key);
		return {
			target: getAddress(target),
			selector: normalizeSelector(selector),
			checks: stored?.checks.map(copyCheck) ?? [],
		};
	}
}
