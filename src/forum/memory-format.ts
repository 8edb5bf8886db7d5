import type { MemoryItem, MemoryKind } from "./types.js";

export const EMPTY_SUMMARY = "No recent forum activity.";

const KIND_MARKERS: Record<MemoryKind, string> = {
	browsed: "👀",
	mentioned: "📢",
	replied: "💬",
	new_thread: "📝",
	created: "✍️",
	diary: "📔",
};

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

/**
 * Local-time `MM-DD HH:mm`.
 */
export function formatMemoryTime(date: Date): string {
	return `${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function kindMarker(kind: MemoryKind): string {
	return KIND_MARKERS[kind];
}

/**
 * One line per item, in the order given.
 */
export function formatSummary(items: readonly MemoryItem[]): string {
	if (items.length === 0) {
		return EMPTY_SUMMARY;
	}
	return items
		.map((item) => `${kindMarker(item.kind)} [${formatMemoryTime(item.timestamp)}] ${item.content}`)
		.join("\n");
}

export function formatThreadContext(threadId: number, items: readonly MemoryItem[]): string {
	if (items.length === 0) {
		return `No activity recorded for thread #${threadId}.`;
	}
	const lines = [`Activity for thread #${threadId}:`];
	for (const item of items) {
		lines.push(`  - [${formatMemoryTime(item.timestamp)}] ${item.content}`);
	}
	return lines.join("\n");
}
