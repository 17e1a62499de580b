/**
 * Client option validation and loading from the environment.
 */

import { z } from "zod";
import type { RfbClientOptions } from "./vnc/types.js";

export const clientOptionsSchema = z.object({
	readTimeout: z.number().int().nonnegative().optional(),
	settleTime: z.number().int().nonnegative().optional(),
	forceRgba: z.boolean().optional(),
	debug: z.boolean().optional(),
});

const flag = z
	.enum(["1", "0", "true", "false"])
	.transform((value) => value === "1" || value === "true");

const envSchema = z.object({
	RFB_READ_TIMEOUT: z
		.string()
		.regex(/^\d+$/, "expected a whole number of milliseconds")
		.transform(Number)
		.optional(),
	RFB_SETTLE_TIME: z
		.string()
		.regex(/^\d+$/, "expected a whole number of milliseconds")
		.transform(Number)
		.optional(),
	RFB_FORCE_RGBA: flag.optional(),
	RFB_DEBUG: flag.optional(),
});

/** Validate options handed to RfbClient.create; the logger passes through as-is. */
export function parseClientOptions(options: RfbClientOptions): RfbClientOptions {
	const { logger, ...rest } = options;
	return { ...clientOptionsSchema.parse(rest), logger };
}

/**
 * Read client options from RFB_READ_TIMEOUT, RFB_SETTLE_TIME, RFB_FORCE_RGBA
 * and RFB_DEBUG.
 * Unset or empty variables leave the option undefined.
 */
export function loadClientOptions(env: NodeJS.ProcessEnv = process.env): RfbClientOptions {
	const raw = {
		RFB_READ_TIMEOUT: env.RFB_READ_TIMEOUT || undefined,
		RFB_SETTLE_TIME: env.RFB_SETTLE_TIME || undefined,
		RFB_FORCE_RGBA: env.RFB_FORCE_RGBA || undefined,
		RFB_DEBUG: env.RFB_DEBUG || undefined,
	};

	const result = envSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new Error(`Invalid ${issue.path.join(".")}: ${issue.message}`);
	}

	return {
		readTimeout: result.data.RFB_READ_TIMEOUT,
		settleTime: result.data.RFB_SETTLE_TIME,
		forceRgba: result.data.RFB_FORCE_RGBA,
		debug: result.data.RFB_DEBUG,
	};
}
