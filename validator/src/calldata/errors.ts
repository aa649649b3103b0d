export const CHECK_ERRORS = {
	ARITY_MISMATCH: "array length mismatch on batched add",
	START_INDEX_TOO_SMALL: "start index must be greater than 3",
	END_INDEX_TOO_SMALL: "end index must be greater than start index",
	END_INDEX_EQUALS_START: "end index equals start index only when it equals 4",
	WILDCARD_NOT_EXCLUSIVE: "wildcard can only be added if no existing check for the pair",
	WILDCARD_EXISTS: "cannot add a non-wildcard check once a wildcard exists for the pair",
	TARGET_IS_SELF: "target address cannot equal the registry's own address",
	TARGET_IS_OPERATOR: "target address cannot equal the trusted-operator address",
	WILDCARD_DATA_NOT_EMPTY: "wildcard check must hold a single empty pattern",
	DATA_LENGTH_MISMATCH: "data and self address check length mismatch",
	INVALID_INDEX: "index must be an unsigned 16-bit integer",
	INVALID_SELECTOR: "selector must be 4 bytes",
	INVALID_DATA: "data must be hex encoded",
	NO_CHECKS: "no checks registered for the pair",
	INDEX_OUT_OF_BOUNDS: "index out of bounds",
} as const;

export type CheckErrorReason = keyof typeof CHECK_ERRORS;

export class CheckValidationError extends Error {
	readonly reason: CheckErrorReason;

	constructor(reason: CheckErrorReason) {
		super(CHECK_ERRORS[reason]);
		this.name = "CheckValidationError";
		this.reason = reason;
	}
}
