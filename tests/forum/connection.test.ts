import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { buildSocketUrl, ForumConnection, type ForumConnectionHandlers } from "../../src/forum/connection.js";
import type { NewThreadEvent, NotificationEvent } from "../../src/forum/types.js";
import { createSocketFactory, type FakeSocket } from "../helpers/fake-socket.js";

const WS_URL = "wss://forum.test/ws/bot";

function mentionFrame(replyId: number) {
	return {
		type: "mention",
		thread_id: 42,
		thread_title: "Hello",
		from_user_id: 7,
		from_username: "alice",
		content: `message ${replyId}`,
		reply_id: replyId,
	};
}

describe("buildSocketUrl", () => {
	it("appends the token as a query parameter", () => {
		expect(buildSocketUrl(WS_URL, "test-token")).toBe("wss://forum.test/ws/bot?token=test-token");
		expect(buildSocketUrl("wss://forum.test/ws/bot?lang=en", "a b")).toBe(
			"wss://forum.test/ws/bot?lang=en&token=a+b",
		);
	});
});

describe("ForumConnection", () => {
	let sockets: FakeSocket[];
	let connection: ForumConnection;
	let notifications: NotificationEvent[];
	let threads: NewThreadEvent[];

	function create(handlers: Partial<ForumConnectionHandlers> = {}) {
		const fake = createSocketFactory();
		sockets = fake.sockets;
		connection = new ForumConnection({
			wsUrl: WS_URL,
			token: "test-token",
			heartbeatMs: 30_000,
			wsFactory: fake.factory,
			handlers: {
				onNotification: handlers.onNotification ?? ((event) => void notifications.push(event)),
				onNewThread: handlers.onNewThread ?? ((event) => void threads.push(event)),
			},
		});
		return connection;
	}

	function current(): FakeSocket {
		const socket = sockets.at(-1);
		if (!socket) throw new Error("no socket created");
		return socket;
	}

	beforeEach(() => {
		vi.useFakeTimers();
		notifications = [];
		threads = [];
	});

	afterEach(async () => {
		await connection.stop();
		vi.useRealTimers();
	});

	it("moves through connecting and connected", () => {
		create().start();

		expect(sockets).toHaveLength(1);
		expect(current().url).toBe("wss://forum.test/ws/bot?token=test-token");
		expect(connection.state).toBe("connecting");
		expect(connection.running).toBe(true);

		current().open();
		expect(connection.state).toBe("connected");

		current().close(1006);
		expect(connection.state).toBe("disconnected");
	});

	it("reports disconnected while waiting after the socket could not be created", async () => {
		connection = new ForumConnection({
			wsUrl: "not a url",
			token: "test-token",
			handlers: { onNotification: () => {}, onNewThread: () => {} },
			wsFactory: () => {
				throw new Error("should not be reached");
			},
		});
		connection.start();
		await vi.advanceTimersByTimeAsync(0);

		expect(connection.state).toBe("disconnected");
		expect(connection.running).toBe(true);
	});

	it("start is idempotent", () => {
		create().start();
		connection.start();

		expect(sockets).toHaveLength(1);
	});

	it("records the bot user id from the connected frame", async () => {
		create().start();
		current().open();
		current().receive({ type: "connected", user_id: 12, message: "welcome" });
		await connection.drain();

		expect(connection.botUserId).toBe(12);
	});

	it("dispatches notifications in arrival order", async () => {
		const order: string[] = [];
		create({
			onNotification: async (event) => {
				if (event.replyId === 1) {
					await new Promise((resolve) => setTimeout(resolve, 100));
				}
				order.push(String(event.replyId));
			},
		}).start();
		current().open();
		current().receive(mentionFrame(1));
		current().receive({ ...mentionFrame(2), type: "reply" });

		await vi.advanceTimersByTimeAsync(100);
		await connection.drain();

		expect(order).toEqual(["1", "2"]);
	});

	it("passes the decoded event and frame to the handler", async () => {
		const onNotification = vi.fn();
		create({ onNotification }).start();
		current().open();
		current().receive({ type: "sub_reply", thread_id: 3, from_username: "bob", content: "+1" });
		await connection.drain();

		expect(onNotification).toHaveBeenCalledWith(
			{
				kind: "sub_reply",
				threadId: 3,
				threadTitle: "",
				fromUserId: null,
				fromUsername: "bob",
				content: "+1",
				replyId: null,
			},
			{ type: "sub_reply", thread_id: 3, thread_title: "", from_username: "bob", content: "+1" },
		);
	});

	it("routes new threads separately", async () => {
		create().start();
		current().open();
		current().receive({ type: "new_thread", thread_id: 8, thread_title: "Fresh", author: "carol" });
		await connection.drain();

		expect(threads).toEqual([{ threadId: 8, threadTitle: "Fresh", author: "carol" }]);
		expect(notifications).toEqual([]);
	});

	it("ignores unknown, malformed and binary frames", async () => {
		create().start();
		current().open();
		current().receive({ type: "vote", thread_id: 1 });
		current().receiveRaw("{ not json");
		current().receive({ type: "mention", thread_id: "not-a-number" });
		current().receive({ type: "pong" });
		current().emit("message", Buffer.from(JSON.stringify(mentionFrame(5))), true);
		current().receive(mentionFrame(6));
		await connection.drain();

		expect(notifications.map((event) => event.replyId)).toEqual([6]);
		expect(connection.state).toBe("connected");
	});

	it("keeps dispatching after a handler throws", async () => {
		let calls = 0;
		create({
			onNotification: () => {
				calls++;
				if (calls === 1) throw new Error("handler exploded");
			},
		}).start();
		current().open();
		current().receive(mentionFrame(1));
		current().receive(mentionFrame(2));
		await connection.drain();

		expect(calls).toBe(2);
	});

	it("backs off exponentially while the server is unreachable", async () => {
		create().start();

		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(4_999);
		expect(sockets).toHaveLength(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(sockets).toHaveLength(2);

		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(9_999);
		expect(sockets).toHaveLength(2);
		await vi.advanceTimersByTimeAsync(1);
		expect(sockets).toHaveLength(3);

		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(20_000);
		expect(sockets).toHaveLength(4);
		expect(connection.state).toBe("connecting");
	});

	it("resets the backoff once a connection opens", async () => {
		create().start();

		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(5_000);
		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(10_000);
		expect(sockets).toHaveLength(3);

		current().open();
		current().close(1006);
		await vi.advanceTimersByTimeAsync(4_999);
		expect(sockets).toHaveLength(3);
		await vi.advanceTimersByTimeAsync(1);
		expect(sockets).toHaveLength(4);
	});

	it("pings on the heartbeat interval only while open", async () => {
		create().start();
		await vi.advanceTimersByTimeAsync(30_000);
		expect(current().pings).toBe(0);

		current().open();
		await vi.advanceTimersByTimeAsync(60_000);
		expect(current().pings).toBe(2);
	});

	it("does not carry a heartbeat across reconnects", async () => {
		create().start();
		const first = current();
		first.open();
		await vi.advanceTimersByTimeAsync(30_000);
		expect(first.pings).toBe(1);

		first.close(1006);
		await vi.advanceTimersByTimeAsync(0);
		// Only the reconnect delay is pending
		expect(vi.getTimerCount()).toBe(1);

		await vi.advanceTimersByTimeAsync(5_000);
		const second = current();
		expect(second).not.toBe(first);
		second.open();
		await vi.advanceTimersByTimeAsync(30_000);

		expect(second.pings).toBe(1);
		expect(first.pings).toBe(1);
		expect(vi.getTimerCount()).toBe(1);
	});

	it("drops the connection and reconnects when a ping fails", async () => {
		create().start();
		const first = current();
		first.open();
		first.failPing = true;

		await vi.advanceTimersByTimeAsync(30_000);
		expect(first.closeCode).toBe(1006);
		expect(connection.state).toBe("disconnected");

		await vi.advanceTimersByTimeAsync(5_000);
		expect(sockets).toHaveLength(2);
	});

	it("stop closes the socket and ends the loop", async () => {
		create().start();
		const socket = current();
		socket.open();

		await connection.stop();
		await connection.stop();

		expect(socket.closeCode).toBe(1000);
		expect(connection.state).toBe("disconnected");
		expect(connection.running).toBe(false);

		await vi.advanceTimersByTimeAsync(120_000);
		expect(sockets).toHaveLength(1);
	});

	it("stop cancels a pending reconnect", async () => {
		create().start();
		current().fail(new Error("connect ECONNREFUSED 127.0.0.1:443"));
		await vi.advanceTimersByTimeAsync(1_000);

		await connection.stop();
		await vi.advanceTimersByTimeAsync(120_000);

		expect(sockets).toHaveLength(1);
		expect(vi.getTimerCount()).toBe(0);
	});
});
