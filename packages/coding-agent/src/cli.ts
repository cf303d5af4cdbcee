#!/usr/bin/env -S node --import tsx
/**
 * CLI entry point: registers every command explicitly; `chat` runs when none is named.
 */
import { APP_NAME, VERSION } from "@finch/utils";
import { Command } from "commander";
import { formatCommandError } from "./cli/errors";
import { createChatCommand } from "./commands/chat";
import { createConfigCommand } from "./commands/config";
import { createInitCommand } from "./commands/init";
import { createSessionsCommand } from "./commands/sessions";

process.title = APP_NAME;

const program = new Command(APP_NAME)
	.version(VERSION)
	.description("Terminal agent that drives a local model through tools, plans and specialist agents")
	.addCommand(createChatCommand(), { isDefault: true })
	.addCommand(createSessionsCommand())
	.addCommand(createConfigCommand())
	.addCommand(createInitCommand());

program.parseAsync(process.argv).catch((err: unknown) => {
	process.stderr.write(`${formatCommandError(APP_NAME, err)}\n`);
	process.exitCode = 1;
});
