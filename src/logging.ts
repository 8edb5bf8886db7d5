import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

export const DEFAULT_LOG_FILE = path.join(CONFIG_DIR, "logs", "forum-channel.log");

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
// Bumped on every rebuild so child loggers know to re-bind
let generation = 0;

function isLevel(candidate: string): candidate is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === candidate);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const cfg: LoggingConfig | undefined = loadConfig().logging;
	return {
		level: normalizeLevel(cfg?.level),
		file: cfg?.file ?? DEFAULT_LOG_FILE,
	};
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch (err) {
		process.stderr.write(`log flush failed: ${String(err)}\n`);
	}
	dest.end();
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	// Logs can carry thread titles and user names; keep them owner-only
	fs.mkdirSync(path.dirname(settings.file), { recursive: true, mode: 0o700 });

	const destination = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true, // log volume is modest
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
		generation++;
	}
	return cachedLogger;
}

export type ChildLogger = Pick<Logger, "fatal" | "error" | "warn" | "info" | "debug" | "trace">;

/**
 * Module loggers are created at import time, before CLI flags are applied.
 * Each one re-binds to the current root logger whenever it has been rebuilt,
 * so it never writes to a closed destination.
 */
export function getChildLogger(bindings: Bindings = {}, opts?: { level?: LevelWithSilent }): ChildLogger {
	let child: Logger | null = null;
	let childGeneration = -1;

	const current = (): Logger => {
		const root = cachedLogger ?? getLogger();
		if (!child || childGeneration !== generation) {
			child = root.child(bindings, opts);
			childGeneration = generation;
		}
		return child;
	};

	return {
		get fatal() {
			const logger = current();
			return logger.fatal.bind(logger);
		},
		get error() {
			const logger = current();
			return logger.error.bind(logger);
		},
		get warn() {
			const logger = current();
			return logger.warn.bind(logger);
		},
		get info() {
			const logger = current();
			return logger.info.bind(logger);
		},
		get debug() {
			const logger = current();
			return logger.debug.bind(logger);
		},
		get trace() {
			const logger = current();
			return logger.trace.bind(logger);
		},
	};
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
