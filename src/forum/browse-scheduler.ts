import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "forum-browse-scheduler" });

export const DEFAULT_BROWSE_SETTLE_MS = 60_000;
export const DEFAULT_BROWSE_INTERVAL_MS = 3_600_000;
export const MIN_BROWSE_INTERVAL_MS = 60_000;

export type BrowseScheduler = {
	stop: () => void;
};

/**
 * Run `onBrowse` once after `initialDelayMs`, then every `intervalMs`.
 * A failed cycle is logged and the schedule carries on.
 */
export function startBrowseScheduler(options: {
	intervalMs: number;
	initialDelayMs?: number;
	onBrowse: () => void | Promise<void>;
}): BrowseScheduler {
	const intervalMs = Math.max(options.intervalMs, MIN_BROWSE_INTERVAL_MS);
	if (intervalMs !== options.intervalMs) {
		logger.warn(
			{ requestedMs: options.intervalMs, intervalMs },
			"browse interval below minimum; using the minimum",
		);
	}
	const initialDelayMs = options.initialDelayMs ?? DEFAULT_BROWSE_SETTLE_MS;
	let running = false;
	let stopped = false;
	let interval: NodeJS.Timeout | null = null;

	const runCycle = async () => {
		if (running) {
			logger.warn("browse cycle already running; skipping");
			return;
		}
		running = true;
		try {
			await options.onBrowse();
		} catch (err) {
			logger.error({ error: formatErrorSafe(err) }, "browse cycle failed");
		} finally {
			running = false;
		}
	};

	const settle = setTimeout(() => {
		if (stopped) return;
		interval = setInterval(() => void runCycle(), intervalMs);
		interval.unref();
		void runCycle();
	}, initialDelayMs);
	settle.unref();

	logger.info({ initialDelayMs, intervalMs }, "browse scheduler started");

	return {
		stop: () => {
			if (stopped) return;
			stopped = true;
			clearTimeout(settle);
			if (interval) clearInterval(interval);
		},
	};
}
