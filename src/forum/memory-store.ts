/**
 * Cross-session forum memory.
 *
 * A bounded log of what happened on the forum (mentions, replies, browse
 * sessions, diary entries) that the reasoning layer can recall from any chat.
 * Every mutation rewrites the whole file; the log is small and bounded.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { z } from "zod";

import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { BoundedLog } from "./bounded-log.js";
import { formatSummary, formatThreadContext } from "./memory-format.js";
import { MEMORY_KINDS, type MemoryItem, type MemoryKind, type MemoryMetadata } from "./types.js";

const logger = getChildLogger({ module: "forum-memory" });

export const DEFAULT_MAX_ITEMS = 50;
export const THREAD_CONTEXT_LIMIT = 5;

const STORE_VERSION = 1;

const StoredItemSchema = z.object({
	memory_type: z.enum(MEMORY_KINDS),
	content: z.string(),
	timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
		message: "timestamp must be an ISO-8601 date",
	}),
	metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

// Unversioned files hold a bare array of items
const StoredDocumentSchema = z.union([
	z.object({ version: z.literal(STORE_VERSION), items: z.array(z.unknown()) }),
	z.array(z.unknown()),
]);

type StoredItem = z.infer<typeof StoredItemSchema>;

export type ForumMemoryOptions = {
	filePath: string;
	maxItems?: number;
	/** Clock for new items. */
	now?: () => Date;
};

export type MemoryQuery = {
	kind?: MemoryKind;
	limit?: number;
};

export function createMemoryItem(
	kind: MemoryKind,
	content: string,
	metadata: MemoryMetadata = {},
	timestamp: Date = new Date(),
): MemoryItem {
	const epochMs = timestamp.getTime();
	return Object.freeze({
		kind,
		content,
		// Date is mutable; hand out a fresh copy on every read
		get timestamp() {
			return new Date(epochMs);
		},
		metadata: Object.freeze({ ...metadata }),
	});
}

export class ForumMemory {
	readonly filePath: string;
	private readonly log: BoundedLog<MemoryItem>;
	private readonly now: () => Date;

	constructor(options: ForumMemoryOptions) {
		this.filePath = options.filePath;
		this.log = new BoundedLog(options.maxItems ?? DEFAULT_MAX_ITEMS);
		this.now = options.now ?? (() => new Date());

		try {
			mkdirSync(dirname(this.filePath), { recursive: true, mode: 0o700 });
		} catch (err) {
			logger.error({ filePath: this.filePath, error: formatErrorSafe(err) }, "failed to create memory dir");
		}

		this.load();
	}

	get maxItems(): number {
		return this.log.capacity;
	}

	get size(): number {
		return this.log.size;
	}

	/**
	 * Record a new item, evicting the oldest past `maxItems`, and persist.
	 */
	append(kind: MemoryKind, content: string, metadata: MemoryMetadata = {}): void {
		const item = createMemoryItem(kind, content, metadata, this.now());
		this.log.push(item);
		this.save();
		logger.debug({ kind, content: content.slice(0, 50) }, "memory added");
	}

	/**
	 * Newest first, optionally filtered by kind, at most `limit` items.
	 */
	query(options: MemoryQuery = {}): MemoryItem[] {
		let items = this.log.toArray();
		if (options.kind) {
			const kind = options.kind;
			items = items.filter((item) => item.kind === kind);
		}
		items.reverse();
		if (options.limit !== undefined) {
			items = items.slice(0, Math.max(0, options.limit));
		}
		return items;
	}

	/**
	 * The `limit` most recent items, newest first, one line each.
	 */
	summarize(limit = 10): string {
		return formatSummary(this.query({ limit }));
	}

	/**
	 * The most recent items about one thread, oldest to newest.
	 */
	contextForThread(threadId: number): string {
		const related = this.log.toArray().filter((item) => item.metadata.thread_id === threadId);
		return formatThreadContext(threadId, related.slice(-THREAD_CONTEXT_LIMIT));
	}

	clear(): void {
		this.log.clear();
		this.save();
		logger.info("cleared all forum memories");
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// File I/O
	// ═══════════════════════════════════════════════════════════════════════════

	private load(): void {
		if (!existsSync(this.filePath)) {
			return;
		}

		let rawItems: unknown[];
		try {
			const document = StoredDocumentSchema.parse(JSON.parse(readFileSync(this.filePath, "utf8")));
			rawItems = Array.isArray(document) ? document : document.items;
		} catch (err) {
			this.quarantine(err);
			return;
		}

		let skipped = 0;
		for (const raw of rawItems) {
			const parsed = StoredItemSchema.safeParse(raw);
			if (!parsed.success) {
				skipped++;
				continue;
			}
			this.log.push(fromStored(parsed.data));
		}

		if (skipped > 0) {
			logger.warn({ filePath: this.filePath, skipped }, "skipped invalid memory items");
		}
		logger.debug({ count: this.log.size }, "loaded forum memories");
	}

	/**
	 * Move an unreadable file aside so the next save does not destroy it.
	 */
	private quarantine(err: unknown): void {
		const backupPath = `${this.filePath}.corrupted.${Date.now()}`;
		try {
			renameSync(this.filePath, backupPath);
			logger.error(
				{ filePath: this.filePath, backupPath, error: formatErrorSafe(err) },
				"memory file unreadable, moved to backup - starting empty",
			);
		} catch (renameErr) {
			logger.error(
				{ filePath: this.filePath, error: formatErrorSafe(err), renameError: formatErrorSafe(renameErr) },
				"memory file unreadable and backup failed - starting empty",
			);
		}
	}

	private save(): void {
		const document = {
			version: STORE_VERSION,
			items: this.log.toArray().map(toStored),
		};
		const tempPath = `${this.filePath}.tmp`;
		try {
			writeFileSync(tempPath, JSON.stringify(document, null, 2), { encoding: "utf8", mode: 0o600 });
			renameSync(tempPath, this.filePath);
		} catch (err) {
			logger.error({ filePath: this.filePath, error: formatErrorSafe(err) }, "failed to save forum memory");
		}
	}
}

function toStored(item: MemoryItem): StoredItem {
	return {
		memory_type: item.kind,
		content: item.content,
		timestamp: item.timestamp.toISOString(),
		metadata: { ...item.metadata },
	};
}

function fromStored(stored: StoredItem): MemoryItem {
	return createMemoryItem(stored.memory_type, stored.content, stored.metadata, new Date(stored.timestamp));
}
