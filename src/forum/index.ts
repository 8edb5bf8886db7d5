export { BROWSE_SESSION_ID, ForumChannelAdapter, type ForumChannelAdapterOptions } from "./adapter.js";
export { BoundedLog } from "./bounded-log.js";
export { type BrowseScheduler, startBrowseScheduler } from "./browse-scheduler.js";
export { buildSocketUrl, ForumConnection, type ForumConnectionHandlers, type ForumSocketFactory } from "./connection.js";
export { EMPTY_SUMMARY, formatMemoryTime } from "./memory-format.js";
export { createMemoryItem, ForumMemory, type ForumMemoryOptions, type MemoryQuery } from "./memory-store.js";
export { parseInboundFrame, type InboundFrame } from "./protocol.js";
export { Backoff, computeBackoff, type ReconnectPolicy, resolveReconnectPolicy } from "./reconnect.js";
export { recordNewThread, translateNotification } from "./translator.js";
export type {
	ConnectionState,
	EnvelopeSink,
	ForumEnvelope,
	MemoryItem,
	MemoryKind,
	MemoryMetadata,
	NewThreadEvent,
	NotificationEvent,
} from "./types.js";
