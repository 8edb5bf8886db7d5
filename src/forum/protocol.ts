/**
 * Notification socket wire protocol.
 *
 * Text frames carry one JSON object with a `type` discriminator. The set of
 * frames we act on is closed; anything else is reported as unknown and dropped
 * by the caller.
 */

import { z } from "zod";

const IdSchema = z.union([z.number(), z.string()]);

export const ConnectedFrameSchema = z.object({
	type: z.literal("connected"),
	user_id: IdSchema.nullish(),
	message: z.string().nullish(),
});

export const PongFrameSchema = z.object({
	type: z.literal("pong"),
});

const NotificationFields = {
	thread_id: z.number().int(),
	thread_title: z.string().default(""),
	from_user_id: IdSchema.nullish(),
	from_username: z.string().default("unknown"),
	content: z.string().default(""),
	reply_id: IdSchema.nullish(),
};

export const ReplyFrameSchema = z.object({ type: z.literal("reply"), ...NotificationFields });
export const SubReplyFrameSchema = z.object({ type: z.literal("sub_reply"), ...NotificationFields });
export const MentionFrameSchema = z.object({ type: z.literal("mention"), ...NotificationFields });

export const NewThreadFrameSchema = z.object({
	type: z.literal("new_thread"),
	thread_id: z.number().int(),
	thread_title: z.string().default(""),
	author: z.string().default("unknown"),
});

export const InboundFrameSchema = z.discriminatedUnion("type", [
	ConnectedFrameSchema,
	PongFrameSchema,
	ReplyFrameSchema,
	SubReplyFrameSchema,
	MentionFrameSchema,
	NewThreadFrameSchema,
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;
export type InboundFrameType = InboundFrame["type"];
export type NotificationFrame = Extract<InboundFrame, { type: "reply" | "sub_reply" | "mention" }>;
export type NewThreadFrame = z.infer<typeof NewThreadFrameSchema>;

const KNOWN_TYPES: ReadonlySet<string> = new Set<InboundFrameType>([
	"connected",
	"pong",
	"reply",
	"sub_reply",
	"mention",
	"new_thread",
]);

const EnvelopeSchema = z.object({ type: z.string() }).passthrough();

export type FrameParseResult =
	| { ok: true; frame: InboundFrame }
	| { ok: false; reason: "invalid-json" | "unknown-type" | "malformed"; type?: string; error?: string };

/**
 * Decode one text frame.
 */
export function parseInboundFrame(text: string): FrameParseResult {
	let payload: unknown;
	try {
		payload = JSON.parse(text);
	} catch (err) {
		return { ok: false, reason: "invalid-json", error: String(err) };
	}

	const envelope = EnvelopeSchema.safeParse(payload);
	if (!envelope.success) {
		return { ok: false, reason: "malformed", error: envelope.error.message };
	}

	const type = envelope.data.type;
	if (!KNOWN_TYPES.has(type)) {
		return { ok: false, reason: "unknown-type", type };
	}

	const parsed = InboundFrameSchema.safeParse(payload);
	if (!parsed.success) {
		return { ok: false, reason: "malformed", type, error: parsed.error.message };
	}
	return { ok: true, frame: parsed.data };
}
