#!/usr/bin/env node
import dotenv from "dotenv";
import { z } from "zod";
import { CallRejectedError } from "../gate/timelock.js";
import { buildTimelockGate, loadWhitelistFile } from "../service/whitelist.js";
import { checkedAddressSchema, hexDataSchema } from "../types/schemas.js";
import { loadGateSettings } from "../utils/config.js";
import { formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logging.js";

dotenv.config({ quiet: true });

const argsSchema = z.tuple([checkedAddressSchema, hexDataSchema]);

const main = async (): Promise<void> => {
	const [target, data] = argsSchema.parse(process.argv.slice(2));
	const settings = loadGateSettings(process.env);
	const logger = createLogger(settings.logging);
	const gate = buildTimelockGate(settings, loadWhitelistFile(settings.whitelistPath), logger);

	try {
		const checkIndex = gate.checkCall({ to: target, data });
		console.log(`Call to ${target} allowed by check ${checkIndex}`);
	} catch (err) {
		if (!(err instanceof CallRejectedError)) throw err;
		console.log(`Call to ${target} rejected: ${err.message}`);
		if (err.result?.status === "invalid") {
			for (const mismatch of err.result.mismatches) {
				console.log(mismatch);
			}
		}
		process.exitCode = 1;
	}
};

main().catch((err) => {
	console.error(formatError(err));
	process.exitCode = 1;
});
