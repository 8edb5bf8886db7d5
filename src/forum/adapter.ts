/**
 * Forum channel adapter.
 *
 * Presents the forum to the host as one more chat channel: notifications come
 * in over the socket, a scheduler periodically asks the reasoning layer to go
 * browsing, and a shared memory lets any session recall forum activity.
 */

import crypto from "node:crypto";

import type { ForumSettings } from "../config/config.js";
import { resolveForumToken } from "../env.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { type BrowseScheduler, DEFAULT_BROWSE_SETTLE_MS, startBrowseScheduler } from "./browse-scheduler.js";
import { ForumConnection, type ForumSocketFactory } from "./connection.js";
import { ForumMemory } from "./memory-store.js";
import { buildBrowsePrompt } from "./prompts.js";
import { resolveReconnectPolicy } from "./reconnect.js";
import { DEFAULT_SELF_ID, recordNewThread, translateNotification } from "./translator.js";
import type {
	ConnectionState,
	EnvelopeSink,
	ForumEnvelope,
	MemoryKind,
	MemoryMetadata,
} from "./types.js";

const logger = getChildLogger({ module: "forum-adapter" });

export const BROWSE_SESSION_ID = "forum_browse_system";

export type ForumChannelAdapterOptions = {
	settings: ForumSettings;
	emit: EnvelopeSink;
	/** Shared memory instance; built from settings when omitted. */
	memory?: ForumMemory;
	wsFactory?: ForumSocketFactory;
	browseSettleMs?: number;
	env?: NodeJS.ProcessEnv;
};

export class ForumChannelAdapter {
	readonly settings: ForumSettings;
	private readonly memory: ForumMemory;
	private readonly sink: EnvelopeSink;
	private readonly options: ForumChannelAdapterOptions;
	private connection: ForumConnection | null = null;
	private scheduler: BrowseScheduler | null = null;

	constructor(options: ForumChannelAdapterOptions) {
		this.options = options;
		this.settings = options.settings;
		this.sink = options.emit;
		this.memory =
			options.memory ??
			new ForumMemory({ filePath: options.settings.memoryFile, maxItems: options.settings.maxMemoryItems });
	}

	get connectionState(): ConnectionState {
		return this.connection?.state ?? "disconnected";
	}

	get botUserId(): number | string | null {
		return this.connection?.botUserId ?? null;
	}

	get running(): boolean {
		return this.connection !== null;
	}

	/**
	 * Start the socket loop and, if enabled, the browse scheduler.
	 * Returns false without starting anything when no token is configured.
	 */
	start(): boolean {
		if (this.connection) return true;

		const token = resolveForumToken(this.settings, this.options.env);
		if (!token) {
			logger.error("forum token not configured; adapter disabled");
			return false;
		}

		logger.info({ wsUrl: this.settings.wsUrl, autoBrowse: this.settings.autoBrowse }, "starting forum channel");

		this.connection = new ForumConnection({
			wsUrl: this.settings.wsUrl,
			token,
			heartbeatMs: this.settings.heartbeatSeconds * 1000,
			reconnect: resolveReconnectPolicy(this.settings.reconnect),
			wsFactory: this.options.wsFactory,
			handlers: {
				onNotification: (event, frame) => {
					const envelope = translateNotification(event, this.memory, {
						selfId: this.selfId(),
						raw: frame,
					});
					// Not awaited: a slow sink must not hold up later frames
					void this.emit(envelope);
				},
				onNewThread: (event) => {
					recordNewThread(event, this.memory);
				},
			},
		});
		this.connection.start();

		if (this.settings.autoBrowse) {
			this.scheduler = startBrowseScheduler({
				intervalMs: this.settings.browseIntervalSeconds * 1000,
				initialDelayMs: this.options.browseSettleMs ?? DEFAULT_BROWSE_SETTLE_MS,
				onBrowse: () => this.browse(),
			});
		}
		return true;
	}

	/**
	 * Stop every task and release the socket. Safe to call repeatedly.
	 */
	async terminate(): Promise<void> {
		this.scheduler?.stop();
		this.scheduler = null;

		const connection = this.connection;
		this.connection = null;
		if (connection) {
			logger.info("terminating forum channel");
			await connection.stop();
		}
	}

	/**
	 * Hand an envelope to the host queue. Sink failures are logged, not thrown.
	 */
	async emit(envelope: ForumEnvelope): Promise<void> {
		try {
			await this.sink(envelope);
		} catch (err) {
			logger.error({ sessionId: envelope.sessionId, error: formatErrorSafe(err) }, "host rejected envelope");
		}
	}

	/**
	 * One browse cycle: ask the reasoning layer to go exploring.
	 */
	async browse(): Promise<void> {
		logger.info("starting browse session");
		const text = buildBrowsePrompt();
		const envelope: ForumEnvelope = {
			sessionId: BROWSE_SESSION_ID,
			messageId: `browse_${crypto.randomBytes(16).toString("hex")}`,
			selfId: this.selfId(),
			sender: { userId: "system", nickname: "Forum System" },
			text,
			timestamp: Math.floor(Date.now() / 1000),
			wake: true,
			raw: { type: "browse" },
			extras: { isBrowseEvent: true },
		};
		await this.emit(envelope);
		this.memory.append("browsed", "started a forum browsing session");
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Memory surface for the reasoning layer's tools
	// ═══════════════════════════════════════════════════════════════════════════

	getMemory(): ForumMemory {
		return this.memory;
	}

	getMemorySummary(limit = 10): string {
		return this.memory.summarize(limit);
	}

	getMemoryContext(threadId: number): string {
		return this.memory.contextForThread(threadId);
	}

	saveDiary(content: string): void {
		this.memory.append("diary", content);
	}

	recordActivity(kind: MemoryKind, content: string, metadata?: MemoryMetadata): void {
		this.memory.append(kind, content, metadata);
	}

	private selfId(): string {
		const id = this.botUserId;
		return id === null ? DEFAULT_SELF_ID : String(id);
	}
}
