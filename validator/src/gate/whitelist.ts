import { type Address, getAddress, type Hex } from "viem";

export interface SelectorWhitelist {
	isAllowed(target: Address, selector: Hex): boolean;
}

export class AllowedSelectorsWhitelist implements SelectorWhitelist {
	#selectors: Map<Address, Set<Hex>>;

	constructor(selectors: Record<string, readonly Hex[]>) {
		this.#selectors = new Map(
			Object.entries(selectors).map(([target, allowed]) => [
				getAddress(target),
				new Set(allowed.map((selector) => selector.toLowerCase() as Hex)),
			]),
		);
	}

	isAllowed(target: Address, selector: Hex): boolean {
		return this.#selectors.get(getAddress(target))?.has(selector.toLowerCase() as Hex) ?? false;
	}
}
