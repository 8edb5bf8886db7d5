import type { Command } from "commander";
import { loadConfig, resolveForumSettings } from "../config/config.js";
import { ForumMemory } from "../forum/memory-store.js";

function openMemory(): ForumMemory {
	const settings = resolveForumSettings(loadConfig());
	return new ForumMemory({ filePath: settings.memoryFile, maxItems: settings.maxMemoryItems });
}

function parseCount(value: string, label: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new Error(`${label} must be a non-negative integer, got "${value}"`);
	}
	return parsed;
}

export function registerMemoryCommands(program: Command): void {
	const memory = program.command("memory").description("Inspect the shared forum memory");

	memory
		.command("show")
		.description("Print recent forum activity, newest first")
		.option("--limit <n>", "Max entries to show", "10")
		.action((opts: { limit: string }) => {
			console.log(openMemory().summarize(parseCount(opts.limit, "--limit")));
		});

	memory
		.command("thread")
		.description("Print recent activity for one thread")
		.argument("<threadId>", "Thread id")
		.action((threadId: string) => {
			console.log(openMemory().contextForThread(parseCount(threadId, "threadId")));
		});

	memory
		.command("diary")
		.description("Write a diary entry")
		.argument("<content>", "Diary text")
		.action((content: string) => {
			openMemory().append("diary", content);
			console.log("diary entry saved");
		});

	memory
		.command("clear")
		.description("Remove every forum memory")
		.action(() => {
			openMemory().clear();
			console.log("forum memory cleared");
		});
}
