import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import { CONFIG_DIR } from "../utils.js";
import { resolveConfigPath } from "./path.js";

export const DEFAULT_API_BASE = "https://forum.example.com";
export const DEFAULT_WS_URL = "wss://forum.example.com/ws/bot";

// Reconnect backoff for the notification socket
const ReconnectConfigSchema = z.object({
	initialMs: z.number().int().positive().default(5_000),
	maxMs: z.number().int().positive().default(60_000),
	factor: z.number().min(1).default(2),
	jitter: z.number().min(0).max(1).default(0),
});

// Forum channel configuration schema
const ForumConfigSchema = z.object({
	// Base URL for the forum's REST operations (used by host-side tools)
	apiBase: z.string().url().default(DEFAULT_API_BASE),
	// Streaming endpoint; the token is appended as a query parameter
	wsUrl: z.string().url().default(DEFAULT_WS_URL),
	// FORUM_TOKEN env var is used when this is unset
	token: z.string().optional(),
	autoBrowse: z.boolean().default(true),
	// One browse a minute at most
	browseIntervalSeconds: z.number().int().min(60).default(3600),
	// Consumed by the host's reply policy, passed through untouched
	autoReplyMentions: z.boolean().default(true),
	maxMemoryItems: z.number().int().positive().default(50),
	heartbeatSeconds: z.number().int().positive().default(30),
	memoryFile: z.string().optional(),
	reconnect: ReconnectConfigSchema.optional(),
});

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Main config schema
const ForumChannelConfigSchema = z.object({
	forum: ForumConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type ForumChannelConfig = z.infer<typeof ForumChannelConfigSchema>;
export type ForumConfig = z.infer<typeof ForumConfigSchema>;
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Forum settings with every default applied.
 */
export type ForumSettings = Omit<ForumConfig, "reconnect" | "memoryFile"> & {
	memoryFile: string;
	reconnect: ReconnectConfig;
};

let cachedConfig: ForumChannelConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): ForumChannelConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = err instanceof Error && "code" in err ? err.code : undefined;
		if (code === "ENOENT" || code === "EACCES") {
			// No readable config file - use defaults
			return {};
		}
		throw err;
	}
}

export function parseConfig(raw: unknown): ForumChannelConfig {
	return ForumChannelConfigSchema.parse(raw);
}

/**
 * Apply defaults to the `forum` section, whether or not it was present.
 */
export function resolveForumSettings(config: ForumChannelConfig): ForumSettings {
	const forum = config.forum ?? ForumConfigSchema.parse({});
	return {
		...forum,
		memoryFile: forum.memoryFile ?? path.join(CONFIG_DIR, "forum", "forum_memory.json"),
		reconnect: forum.reconnect ?? ReconnectConfigSchema.parse({}),
	};
}

export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
