import { type Address, getAddress, type Hex, isAddressEqual, isHex, size, slice } from "viem";
import { CheckValidationError } from "./errors.js";

// Offset of the first argument byte, directly after the 4 byte selector
export const SELECTOR_SIZE = 4;

const MAX_INDEX = 0xffff;

export type Check = {
	startIndex: number;
	endIndex: number;
	data: Hex[];
	isSelfAddressCheck: boolean[];
};

export type CheckPair = {
	target: Address;
	selector: Hex;
};

export type PairKey = `${Address}:${Hex}`;

export const isWildcardCheck = (check: Pick<Check, "startIndex" | "endIndex">): boolean =>
	check.startIndex === SELECTOR_SIZE && check.endIndex === SELECTOR_SIZE;

export const normalizeSelector = (selector: Hex): Hex => {
	if (!isHex(selector, { strict: true }) || size(selector) !== SELECTOR_SIZE) {
		throw new CheckValidationError("INVALID_SELECTOR");
	}
	return selector.toLowerCase() as Hex;
};

// Returns undefined for payloads that are not even length hex or too short to carry a selector
export const extractSelector = (payload: Hex): Hex | undefined => {
	if (!isHex(payload, { strict: true }) || payload.length % 2 !== 0 || size(payload) < SELECTOR_SIZE) return undefined;
	return slice(payload, 0, SELECTOR_SIZE).toLowerCase() as Hex;
};

export const pairKey = (target: Address, selector: Hex): PairKey =>
	`${getAddress(target)}:${normalizeSelector(selector)}`;

export const copyCheck = (check: Check): Check => ({
	startIndex: check.startIndex,
	endIndex: check.endIndex,
	data: [...check.data],
	isSelfAddressCheck: [...check.isSelfAddressCheck],
});

const isUint16 = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= MAX_INDEX;

/**
 * Validates a single check against the rules that do not depend on the
 * checks already stored for its pair. Rules are evaluated in a fixed order so
 * that the reported reason is deterministic for inputs violating several.
 */
export const validateCheck = (
	target: Address,
	check: Check,
	forbidden: { registry: Address; trustedOperator: Address },
): void => {
	if (isAddressEqual(target, forbidden.registry)) throw new CheckValidationError("TARGET_IS_SELF");
	if (isAddressEqual(target, forbidden.trustedOperator)) throw new CheckValidationError("TARGET_IS_OPERATOR");
	if (check.data.length !== check.isSelfAddressCheck.length) throw new CheckValidationError("DATA_LENGTH_MISMATCH");
	if (!check.data.every((data) => isHex(data, { strict: true }))) throw new CheckValidationError("INVALID_DATA");
	if (!isUint16(check.startIndex) || !isUint16(check.endIndex)) throw new CheckValidationError("INVALID_INDEX");
	if (check.startIndex < SELECTOR_SIZE) throw new CheckValidationError("START_INDEX_TOO_SMALL");
	if (check.startIndex === check.endIndex) {
		if (check.startIndex !== SELECTOR_SIZE) throw new CheckValidationError("END_INDEX_EQUALS_START");
		// Wildcards match without comparing data
		if (check.data.length !== 1 || check.data[0] !== "0x") throw new CheckValidationError("WILDCARD_DATA_NOT_EMPTY");
		return;
	}
	if (check.endIndex < check.startIndex) throw new CheckValidationError("END_INDEX_TOO_SMALL");
};

export const ensureWildcardExclusivity = (existing: readonly Check[], check: Check): void => {
	if (isWildcardCheck(check)) {
		if (existing.length > 0) throw new CheckValidationError("WILDCARD_NOT_EXCLUSIVE");
		return;
	}
	if (existing.some(isWildcardCheck)) throw new CheckValidationError("WILDCARD_EXISTS");
};
