import { BaseError } from "viem";
import { describe, expect, it } from "vitest";
import { CheckValidationError } from "../calldata/errors.js";
import { formatError } from "./errors.js";

describe("formatError", () => {
	it("should keep the reason of check validation errors", () => {
		expect(formatError(new CheckValidationError("START_INDEX_TOO_SMALL"))).toStrictEqual({
			name: "CheckValidationError",
			reason: "START_INDEX_TOO_SMALL",
			message: "start index must be greater than 3",
		});
	});

	it("should flatten viem errors", () => {
		const err = new BaseError("Decoding failed");
		expect(formatError(err)).toStrictEqual({
			name: "BaseError",
			message: "Decoding failed",
			details: "No additional details",
			stack: err.stack,
		});
	});

	it("should reduce other errors to name and message", () => {
		expect(formatError(new TypeError("unexpected"))).toStrictEqual({ name: "TypeError", message: "unexpected" });
	});

	it("should return other values unchanged", () => {
		expect(formatError("failure")).toBe("failure");
	});
});
