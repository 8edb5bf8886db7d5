/**
 * Error classification for the notification socket.
 *
 * Walks `.cause`, `.reason` and `.errors` breadth-first so a failure wrapped
 * by `ws` or by our own code is still recognized.
 */

const TRANSIENT_CODES: ReadonlySet<string> = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
]);

// Lowercase substrings; most come from `ws` handshake failures
const TRANSIENT_MESSAGES = [
	"socket hang up",
	"unexpected server response: 502",
	"unexpected server response: 503",
	"unexpected server response: 504",
	"websocket was closed before the connection was established",
	"client network socket disconnected",
	"opening handshake has timed out",
	"timed out after",
];

const ABORT_MESSAGES = ["this operation was aborted", "the operation was aborted", "signal is aborted"];

const URL_PATTERN = /(?:https?|wss?):\/\/\S+/g;

export type ErrorClass = "abort" | "transient" | "other";

type ErrorFields = { name?: unknown; code?: unknown; message?: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/**
 * Every error reachable from `err`, the root first. Cycles are visited once.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const found: unknown[] = [];
	const seen = new WeakSet<object>();
	let frontier: unknown[] = [err];

	for (let depth = 0; depth <= maxDepth && frontier.length > 0; depth++) {
		const next: unknown[] = [];
		for (const value of frontier) {
			if (value == null) continue;
			if (!isRecord(value)) {
				found.push(value);
				continue;
			}
			if (seen.has(value)) continue;
			seen.add(value);
			found.push(value);

			if (value.cause != null) next.push(value.cause);
			if (value.reason != null) next.push(value.reason);
			if (Array.isArray(value.errors)) next.push(...value.errors);
		}
		frontier = next;
	}
	return found;
}

function fieldsOf(candidate: unknown): ErrorFields {
	if (typeof candidate === "string") return { message: candidate };
	return isRecord(candidate) ? candidate : {};
}

function messageOf(fields: ErrorFields): string {
	return typeof fields.message === "string" ? fields.message.toLowerCase() : "";
}

function someCandidate(err: unknown, test: (fields: ErrorFields, message: string) => boolean): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		const fields = fieldsOf(candidate);
		return test(fields, messageOf(fields));
	});
}

/**
 * True for failures worth retrying: refused or reset connections, DNS
 * hiccups, gateway errors during the upgrade, timeouts.
 */
export function isTransientNetworkError(err: unknown): boolean {
	return someCandidate(
		err,
		(fields, message) =>
			(typeof fields.code === "string" && TRANSIENT_CODES.has(fields.code)) ||
			fields.name === "TimeoutError" ||
			TRANSIENT_MESSAGES.some((pattern) => message.includes(pattern)),
	);
}

/**
 * True for cancellations, which are expected during shutdown.
 */
export function isAbortError(err: unknown): boolean {
	return someCandidate(
		err,
		(fields, message) =>
			fields.name === "AbortError" ||
			fields.code === "ABORT_ERR" ||
			ABORT_MESSAGES.some((pattern) => message.includes(pattern)),
	);
}

export function classifyError(err: unknown): ErrorClass {
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";
	return "other";
}

/**
 * One-line rendering for logs. URLs are replaced with `[URL]` because the
 * socket URL carries the access token.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	let text: string;
	if (err instanceof Error) {
		text = `${err.name}: ${err.message}`;
		if (err.cause != null) {
			text += ` [cause: ${formatErrorSafe(err.cause, Math.floor(maxLength / 2))}]`;
		}
	} else {
		text = String(err);
	}

	const redacted = text.replace(URL_PATTERN, "[URL]");
	return redacted.length > maxLength ? `${redacted.slice(0, maxLength - 3)}...` : redacted;
}
