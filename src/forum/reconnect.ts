import type { ReconnectConfig } from "../config/config.js";

export type ReconnectPolicy = {
	initialMs: number;
	maxMs: number;
	factor: number;
	jitter: number;
};

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
	initialMs: 5_000,
	maxMs: 60_000,
	factor: 2,
	jitter: 0,
};

export function resolveReconnectPolicy(
	config?: Partial<ReconnectConfig>,
	overrides?: Partial<ReconnectPolicy>,
): ReconnectPolicy {
	return {
		initialMs: overrides?.initialMs ?? config?.initialMs ?? DEFAULT_RECONNECT_POLICY.initialMs,
		maxMs: overrides?.maxMs ?? config?.maxMs ?? DEFAULT_RECONNECT_POLICY.maxMs,
		factor: overrides?.factor ?? config?.factor ?? DEFAULT_RECONNECT_POLICY.factor,
		jitter: overrides?.jitter ?? config?.jitter ?? DEFAULT_RECONNECT_POLICY.jitter,
	};
}

/**
 * Compute backoff delay for a given attempt (1-based).
 */
export function computeBackoff(policy: ReconnectPolicy, attempt: number): number {
	const base = policy.initialMs * policy.factor ** (attempt - 1);
	const capped = Math.min(base, policy.maxMs);
	if (policy.jitter === 0) return capped;
	const jitterRange = capped * policy.jitter;
	const jitter = (Math.random() - 0.5) * 2 * jitterRange;
	return Math.max(0, Math.round(capped + jitter));
}

/**
 * Attempt counter for the connect loop: `next()` yields the delay before the
 * next retry, `reset()` is called as soon as a connection opens.
 */
export class Backoff {
	private attempt = 0;

	constructor(private readonly policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY) {}

	get attempts(): number {
		return this.attempt;
	}

	next(): number {
		this.attempt++;
		return computeBackoff(this.policy, this.attempt);
	}

	reset(): void {
		this.attempt = 0;
	}
}

/**
 * Sleep with optional abort signal.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new Error("Aborted"));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new Error("Aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
