/**
 * Notification socket lifecycle.
 *
 * One logical connection per instance: connect with the token as a query
 * parameter, ping while open, reconnect with capped exponential backoff after
 * any disconnect, and hand decoded frames to the handlers in arrival order.
 * The loop never gives up on its own; only stop() ends it.
 */

import WebSocket from "ws";

import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { type NotificationFrame, parseInboundFrame } from "./protocol.js";
import { Backoff, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy, sleepWithAbort } from "./reconnect.js";
import { newThreadFromFrame, notificationFromFrame } from "./translator.js";
import type { ConnectionState, NewThreadEvent, NotificationEvent } from "./types.js";

const logger = getChildLogger({ module: "forum-connection" });

export const DEFAULT_HEARTBEAT_MS = 30_000;

export type ForumSocketFactory = (url: string) => WebSocket;

export type ForumConnectionHandlers = {
	onNotification: (event: NotificationEvent, frame: NotificationFrame) => void | Promise<void>;
	onNewThread: (event: NewThreadEvent) => void | Promise<void>;
};

export type ForumConnectionOptions = {
	wsUrl: string;
	token: string;
	handlers: ForumConnectionHandlers;
	heartbeatMs?: number;
	reconnect?: ReconnectPolicy;
	/** Override WebSocket construction for testing. */
	wsFactory?: ForumSocketFactory;
};

export function buildSocketUrl(wsUrl: string, token: string): string {
	const url = new URL(wsUrl);
	url.searchParams.set("token", token);
	return url.toString();
}

export class ForumConnection {
	private readonly options: ForumConnectionOptions;
	private readonly wsFactory: ForumSocketFactory;
	private readonly heartbeatMs: number;
	private readonly backoff: Backoff;

	private currentState: ConnectionState = "disconnected";
	private userId: number | string | null = null;
	private ws: WebSocket | null = null;
	private heartbeat: { socket: WebSocket; timer: NodeJS.Timeout } | null = null;
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private dispatchChain: Promise<void> = Promise.resolve();

	constructor(options: ForumConnectionOptions) {
		this.options = options;
		this.wsFactory = options.wsFactory ?? ((url) => new WebSocket(url));
		this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
		this.backoff = new Backoff(options.reconnect ?? DEFAULT_RECONNECT_POLICY);
	}

	get state(): ConnectionState {
		return this.currentState;
	}

	/** Forum user id of the bot, as announced by the `connected` frame. */
	get botUserId(): number | string | null {
		return this.userId;
	}

	get running(): boolean {
		return this.controller !== null;
	}

	start(): void {
		if (this.controller) return;
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal);
	}

	/**
	 * Cancel the loop, any pending backoff, the heartbeat, and the socket.
	 * Safe to call repeatedly.
	 */
	async stop(): Promise<void> {
		const controller = this.controller;
		if (!controller) return;
		this.controller = null;
		controller.abort();

		const ws = this.ws;
		this.ws = null;
		if (ws) {
			this.stopHeartbeat(ws);
			closeQuietly(ws);
		}

		const loop = this.loop;
		this.loop = null;
		await loop;
		this.currentState = "disconnected";
		logger.info("forum connection stopped");
	}

	/**
	 * Resolves once every frame received so far has been handled.
	 */
	drain(): Promise<void> {
		return this.dispatchChain;
	}

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.connectOnce(signal);
			} catch (err) {
				this.currentState = "disconnected";
				if (!signal.aborted) {
					logger.error(
						{ error: formatErrorSafe(err), transient: isTransientNetworkError(err) },
						"forum socket connection failed",
					);
				}
			}
			if (signal.aborted) break;

			const delay = this.backoff.next();
			logger.info({ delayMs: delay, attempt: this.backoff.attempts }, "reconnecting to forum socket");
			try {
				await sleepWithAbort(delay, signal);
			} catch (err) {
				if (signal.aborted) break;
				throw err;
			}
		}
		this.currentState = "disconnected";
	}

	/**
	 * Resolves when an open socket closes; rejects if it never opened.
	 */
	private connectOnce(signal: AbortSignal): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.currentState = "connecting";
			logger.info({ wsUrl: this.options.wsUrl }, "connecting to forum socket");

			const ws = this.wsFactory(buildSocketUrl(this.options.wsUrl, this.options.token));
			this.ws = ws;
			let opened = false;
			let lastError: Error | null = null;

			const onAbort = () => resolve();
			signal.addEventListener("abort", onAbort, { once: true });

			ws.on("open", () => {
				if (signal.aborted) return;
				opened = true;
				this.currentState = "connected";
				this.backoff.reset();
				this.startHeartbeat(ws);
				logger.info("forum socket connected");
			});

			ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
				if (signal.aborted) return;
				if (isBinary) {
					logger.debug("ignoring binary frame");
					return;
				}
				this.enqueueFrame(data.toString());
			});

			ws.on("error", (err: Error) => {
				lastError = err;
				if (!signal.aborted) {
					logger.error({ error: formatErrorSafe(err) }, "forum socket error");
				}
			});

			ws.on("close", (code: number, reason: Buffer) => {
				signal.removeEventListener("abort", onAbort);
				this.stopHeartbeat(ws);
				if (this.ws === ws) {
					this.ws = null;
					this.currentState = "disconnected";
				}
				if (!opened && !signal.aborted) {
					reject(lastError ?? new Error(`forum socket closed before opening (code ${code})`));
					return;
				}
				logger.info({ code, reason: reason.toString() }, "forum socket closed");
				resolve();
			});
		});
	}

	private startHeartbeat(ws: WebSocket): void {
		this.stopHeartbeat();
		const timer = setInterval(() => {
			if (ws.readyState !== WebSocket.OPEN) return;
			try {
				ws.ping();
			} catch (err) {
				// Dropping the socket routes through close -> reconnect
				logger.error({ error: formatErrorSafe(err) }, "heartbeat failed; dropping connection");
				this.stopHeartbeat(ws);
				ws.terminate();
			}
		}, this.heartbeatMs);
		timer.unref();
		this.heartbeat = { socket: ws, timer };
	}

	/**
	 * Clear the heartbeat, or only the one bound to `socket` when given.
	 */
	private stopHeartbeat(socket?: WebSocket): void {
		if (!this.heartbeat) return;
		if (socket && this.heartbeat.socket !== socket) return;
		clearInterval(this.heartbeat.timer);
		this.heartbeat = null;
	}

	private enqueueFrame(text: string): void {
		this.dispatchChain = this.dispatchChain
			.then(() => this.handleFrame(text))
			.catch((err: unknown) => {
				logger.error({ error: formatErrorSafe(err) }, "failed to handle forum frame");
			});
	}

	private async handleFrame(text: string): Promise<void> {
		const parsed = parseInboundFrame(text);
		if (!parsed.ok) {
			logger.debug({ reason: parsed.reason, type: parsed.type, error: parsed.error }, "ignoring forum frame");
			return;
		}

		const frame = parsed.frame;
		logger.debug({ type: frame.type }, "received forum frame");

		switch (frame.type) {
			case "connected":
				this.userId = frame.user_id ?? null;
				logger.info({ userId: this.userId, message: frame.message }, "forum session established");
				return;
			case "pong":
				return;
			case "reply":
			case "sub_reply":
			case "mention":
				logger.info(
					{ type: frame.type, from: frame.from_username, threadId: frame.thread_id },
					"forum notification",
				);
				await this.options.handlers.onNotification(notificationFromFrame(frame), frame);
				return;
			case "new_thread":
				logger.debug({ threadId: frame.thread_id, author: frame.author }, "new forum thread");
				await this.options.handlers.onNewThread(newThreadFromFrame(frame));
				return;
			default: {
				const exhaustiveCheck: never = frame;
				logger.debug({ frame: String(exhaustiveCheck) }, "ignoring forum frame");
			}
		}
	}
}

function closeQuietly(ws: WebSocket): void {
	try {
		ws.close(1000, "shutdown");
	} catch (err) {
		logger.debug({ error: formatErrorSafe(err) }, "socket close failed; terminating");
		ws.terminate();
	}
}
