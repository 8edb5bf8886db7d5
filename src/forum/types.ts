/**
 * Forum channel types shared by the connection, translator, scheduler and memory.
 */

export const MEMORY_KINDS = ["browsed", "mentioned", "replied", "new_thread", "created", "diary"] as const;
export type MemoryKind = (typeof MEMORY_KINDS)[number];

export type MemoryMetadataValue = string | number | boolean | null;
export type MemoryMetadata = Readonly<Record<string, MemoryMetadataValue>>;

/**
 * One remembered forum happening. Frozen once created.
 */
export type MemoryItem = {
	readonly kind: MemoryKind;
	readonly content: string;
	readonly timestamp: Date;
	readonly metadata: MemoryMetadata;
};

export type ConnectionState = "disconnected" | "connecting" | "connected";

export type NotificationKind = "reply" | "sub_reply" | "mention";

/**
 * A reply or mention aimed at the bot, as pushed by the notification socket.
 */
export type NotificationEvent = {
	kind: NotificationKind;
	threadId: number;
	threadTitle: string;
	fromUserId: number | string | null;
	fromUsername: string;
	content: string;
	replyId: number | string | null;
};

export type NewThreadEvent = {
	threadId: number;
	threadTitle: string;
	author: string;
};

export type ForumEnvelopeExtras = {
	threadId?: number;
	threadTitle?: string;
	replyId?: number | string | null;
	notificationType?: NotificationKind;
	isBrowseEvent?: boolean;
};

/**
 * Normalized message handed to the host's event queue.
 */
export type ForumEnvelope = {
	/** Conversation key; stable per (thread, user) pair. */
	sessionId: string;
	messageId: string;
	/** The bot's own forum identity, or "forum" before the server told us. */
	selfId: string;
	sender: { userId: string; nickname: string };
	text: string;
	/** Unix seconds. */
	timestamp: number;
	/** Marks the message as addressed to the bot (wake the reasoning layer). */
	wake: boolean;
	raw: unknown;
	extras: ForumEnvelopeExtras;
};

/**
 * Host-side sink for envelopes. May be async; the channel never awaits it
 * longer than needed to keep frame order.
 */
export type EnvelopeSink = (envelope: ForumEnvelope) => void | Promise<void>;
