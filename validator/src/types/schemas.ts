import { type Address, checksumAddress, type Hex, isAddress, size } from "viem";
import { z } from "zod";

export const checkedAddressSchema = z
	.string()
	.refine((arg) => isAddress(arg))
	.transform((arg) => checksumAddress(arg as Address));

export const hexDataSchema = z
	.string()
	.regex(/^0x([0-9a-fA-F]{2})*$/, "expected even length hex data")
	.transform((arg) => arg.toLowerCase() as Hex);

export const selectorSchema = hexDataSchema.refine((arg) => size(arg) === 4, "selector must be 4 bytes");

export const indexSchema = z.int().min(0).max(0xffff);

export const checkSchema = z.object({
	startIndex: indexSchema,
	endIndex: indexSchema,
	data: z.array(hexDataSchema),
	isSelfAddressCheck: z.array(z.boolean()),
});

export const whitelistEntrySchema = checkSchema.extend({
	target: checkedAddressSchema,
	selector: selectorSchema,
});

export const whitelistFileSchema = z.object({
	checks: z.array(whitelistEntrySchema),
	selectors: z.record(z.string(), z.array(selectorSchema)).optional(),
});

export type WhitelistFile = z.infer<typeof whitelistFileSchema>;

const booleanFlagSchema = z
	.enum(["true", "false", "1", "0"])
	.transform((arg) => arg === "true" || arg === "1");

export const validatorConfigSchema = z.object({
	REGISTRY_ADDRESS: checkedAddressSchema,
	TRUSTED_OPERATOR_ADDRESS: checkedAddressSchema,
	EXECUTOR_ADDRESS: checkedAddressSchema,
	WHITELIST_PATH: z.string().min(1),
	LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
	LOG_PRETTY: booleanFlagSchema.optional(),
});

export type ValidatorConfig = z.infer<typeof validatorConfigSchema>;
