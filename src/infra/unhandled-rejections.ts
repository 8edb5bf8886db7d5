/**
 * Process-level unhandled rejection handler.
 *
 * Fatal and configuration failures exit the process; transient network
 * failures and aborts are logged and the channel keeps running.
 */

import { getChildLogger } from "../logging.js";
import { classifyError, formatErrorSafe } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

const MESSAGE_CATEGORIES: ReadonlyArray<{ category: "config" | "fatal"; patterns: readonly string[] }> = [
	{
		category: "config",
		patterns: ["is not configured", "missing required", "invalid configuration", "zoderror", "cannot find module"],
	},
	{
		category: "fatal",
		patterns: ["out of memory", "assertion", "invariant", "maximum call stack"],
	},
];

export function categorize(err: unknown): RejectionCategory {
	const errorClass = classifyError(err);
	if (errorClass !== "other") return errorClass;

	const lower = formatErrorSafe(err, 1000).toLowerCase();
	const match = MESSAGE_CATEGORIES.find(({ patterns }) => patterns.some((pattern) => lower.includes(pattern)));
	return match?.category ?? "unknown";
}

/**
 * Install once at startup, before the adapter starts its tasks.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const context = { process: processLabel, category };
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug(context, `suppressed abort rejection: ${formatted}`);
				return;
			case "transient":
				// the connect loop retries on its own
				logger.warn(context, `transient unhandled rejection (continuing): ${formatted}`);
				return;
			case "config":
			case "fatal":
				logger.fatal(context, `unhandled rejection (exiting): ${formatted}`);
				process.exit(1);
				return;
			case "unknown":
				logger.error(context, `unhandled rejection: ${formatted}`);
				return;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
