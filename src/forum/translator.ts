/**
 * Turns forum notifications into memory entries and host envelopes.
 */

import crypto from "node:crypto";

import { previewText } from "../utils.js";
import type { ForumMemory } from "./memory-store.js";
import type { NewThreadFrame, NotificationFrame } from "./protocol.js";
import type { ForumEnvelope, NewThreadEvent, NotificationEvent } from "./types.js";

export const DEFAULT_SELF_ID = "forum";

export function notificationFromFrame(frame: NotificationFrame): NotificationEvent {
	return {
		kind: frame.type,
		threadId: frame.thread_id,
		threadTitle: frame.thread_title,
		fromUserId: frame.from_user_id ?? null,
		fromUsername: frame.from_username,
		content: frame.content,
		replyId: frame.reply_id ?? null,
	};
}

export function newThreadFromFrame(frame: NewThreadFrame): NewThreadEvent {
	return {
		threadId: frame.thread_id,
		threadTitle: frame.thread_title,
		author: frame.author,
	};
}

/**
 * Same thread and same user always map to the same conversation.
 */
export function notificationSessionId(threadId: number, fromUserId: number | string | null): string {
	return `forum_${threadId}_${fromUserId ?? "unknown"}`;
}

export function describeNotification(event: NotificationEvent): string {
	const preview = previewText(event.content);
	if (event.kind === "mention") {
		return `mentioned by @${event.fromUsername} in «${event.threadTitle}»: ${preview}`;
	}
	return `${event.fromUsername} replied to you in «${event.threadTitle}»: ${preview}`;
}

/**
 * Remember the notification and build the envelope that wakes the reasoning layer.
 */
export function translateNotification(
	event: NotificationEvent,
	memory: ForumMemory,
	options: { selfId?: string; raw?: unknown; now?: () => Date } = {},
): ForumEnvelope {
	memory.append(event.kind === "mention" ? "mentioned" : "replied", describeNotification(event), {
		thread_id: event.threadId,
		thread_title: event.threadTitle,
		from_user: event.fromUsername,
	});

	const now = options.now?.() ?? new Date();
	return {
		sessionId: notificationSessionId(event.threadId, event.fromUserId),
		messageId: event.replyId !== null ? String(event.replyId) : crypto.randomBytes(16).toString("hex"),
		selfId: options.selfId ?? DEFAULT_SELF_ID,
		sender: {
			userId: String(event.fromUserId ?? "unknown"),
			nickname: event.fromUsername,
		},
		text: event.content,
		timestamp: Math.floor(now.getTime() / 1000),
		wake: true,
		raw: options.raw ?? event,
		extras: {
			threadId: event.threadId,
			threadTitle: event.threadTitle,
			replyId: event.replyId,
			notificationType: event.kind,
		},
	};
}

/**
 * New threads are informational: remembered, never routed to the reasoning layer.
 */
export function recordNewThread(event: NewThreadEvent, memory: ForumMemory): void {
	memory.append("new_thread", `new thread posted: «${event.threadTitle}» by ${event.author}`, {
		thread_id: event.threadId,
		thread_title: event.threadTitle,
		author: event.author,
	});
}
