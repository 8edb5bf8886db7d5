import type { Command } from "commander";
import { loadConfig, resolveForumSettings } from "../config/config.js";
import { ForumChannelAdapter } from "../forum/adapter.js";
import type { ForumEnvelope } from "../forum/types.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "cmd-run" });

function printEnvelope(envelope: ForumEnvelope): void {
	const { raw: _raw, ...rest } = envelope;
	process.stdout.write(`${JSON.stringify(rest)}\n`);
}

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Connect to the forum and print envelopes as JSON lines")
		.option("--no-browse", "Disable the autonomous browse scheduler")
		.action(async (opts: { browse: boolean }) => {
			const settings = resolveForumSettings(loadConfig());
			const adapter = new ForumChannelAdapter({
				settings: { ...settings, autoBrowse: settings.autoBrowse && opts.browse },
				emit: printEnvelope,
			});

			installUnhandledRejectionHandler("forum-channel");

			if (!adapter.start()) {
				console.error("Forum token not found. Set forum.token in the config file or FORUM_TOKEN.");
				process.exitCode = 1;
				return;
			}

			console.error(`Listening on ${settings.wsUrl}. Ctrl+C to stop.`);

			await new Promise<void>((resolve) => {
				const shutdown = (signal: NodeJS.Signals) => {
					logger.info({ signal }, "shutdown requested");
					adapter.terminate().then(resolve, (err: unknown) => {
						logger.error({ error: String(err) }, "shutdown failed");
						resolve();
					});
				};
				process.once("SIGINT", shutdown);
				process.once("SIGTERM", shutdown);
			});
		});
}
