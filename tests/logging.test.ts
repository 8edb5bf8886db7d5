import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, afterEach, describe, expect, it, vi } from "vitest";

const tempDir = vi.hoisted(() => ({ current: "" }));

vi.mock("../src/utils.js", async () => {
	const actual = await vi.importActual<typeof import("../src/utils.js")>("../src/utils.js");
	tempDir.current = fs.mkdtempSync(path.join(os.tmpdir(), "forum-channel-logs-"));
	return {
		...actual,
		CONFIG_DIR: tempDir.current,
	};
});

import { setVerbose } from "../src/globals.js";
import { closeLogger, getChildLogger, getLogger } from "../src/logging.js";

const logFile = () => path.join(tempDir.current, "logs", "forum-channel.log");

function readEntries(): Array<{ level: number; msg: string; module?: string }> {
	return fs
		.readFileSync(logFile(), "utf8")
		.trim()
		.split("\n")
		.map((line) => JSON.parse(line));
}

afterEach(() => {
	setVerbose(false);
	closeLogger();
	vi.unstubAllEnvs();
});

afterAll(() => {
	fs.rmSync(tempDir.current, { recursive: true, force: true });
});

describe("logging", () => {
	it("keeps module loggers usable after flags rebuild the root logger", () => {
		vi.stubEnv("FORUM_CHANNEL_CONFIG", "");
		const logger = getChildLogger({ module: "test-module" });
		logger.info("before");
		logger.debug("hidden at info");

		setVerbose(true);
		getLogger();

		expect(() => logger.debug("after")).not.toThrow();
		closeLogger();

		expect(readEntries().map(({ level, msg, module }) => ({ level, msg, module }))).toEqual([
			{ level: 30, msg: "before", module: "test-module" },
			{ level: 20, msg: "after", module: "test-module" },
		]);
	});
});
