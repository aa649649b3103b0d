import { BaseError } from "viem";
import { CheckValidationError } from "../calldata/errors.js";

export const formatError = (err: unknown): unknown => {
	if (err instanceof CheckValidationError) {
		return { name: err.name, reason: err.reason, message: err.message };
	}

	if (err instanceof BaseError) {
		// Decoding errors nest the cause, use .walk() to find one with a stack trace
		const ground0 = err.walk((err) => !!err && typeof err === "object" && "stack" in err && err.stack !== undefined);

		return {
			name: err.name,
			message: err.shortMessage || err.message,
			details: err.details || "No additional details",
			stack: ground0?.stack,
		};
	}

	if (err instanceof Error) {
		return { name: err.name, message: err.message };
	}

	return err;
};
