/**
 * Show and change settings in ~/.finch/config.yml.
 */
import { Command } from "commander";
import { type ConfigCommandArgs, type ConfigShortcuts, applyConfigShortcuts, runConfigCommand } from "../cli/config-cli";
import { runAction } from "../cli/errors";
import { Settings } from "../config/settings";

const print = (text: string) => process.stdout.write(`${text}\n`);

async function run(cmd: ConfigCommandArgs): Promise<void> {
	const settings = await Settings.init();
	await runConfigCommand(cmd, settings, print);
}

export function createConfigCommand(): Command {
	const config = new Command("config")
		.description("Show or change settings")
		.option("--host <url>", "Set model.host")
		.option("--model <name>", "Set model.name")
		.action((options: ConfigShortcuts) =>
			runAction("update config", async () => {
				const settings = await Settings.init();
				if (!(await applyConfigShortcuts(options, settings, print))) {
					await runConfigCommand({ action: "list" }, settings, print);
				}
			}),
		);
	config
		.command("list")
		.description("List every setting with its effective value")
		.action(() => runAction("list settings", () => run({ action: "list" })));
	config
		.command("get <key>")
		.description("Print one setting")
		.action((key: string) => runAction("get setting", () => run({ action: "get", key })));
	config
		.command("set <key> <value>")
		.description("Store a setting")
		.action((key: string, value: string) => runAction("set setting", () => run({ action: "set", key, value })));
	config
		.command("reset [key]")
		.description("Remove a stored setting (or all of them)")
		.action((key: string | undefined) => runAction("reset setting", () => run({ action: "reset", key })));
	config
		.command("path")
		.description("Print the config file location")
		.action(() => runAction("show config path", () => run({ action: "path" })));
	return config;
}
