#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerMemoryCommands } from "./commands/memory.js";
import { registerRunCommand } from "./commands/run.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

const program = createProgram();

registerRunCommand(program);
registerMemoryCommands(program);

// Global options must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination keeps a handle open
		closeLogger();
	});
