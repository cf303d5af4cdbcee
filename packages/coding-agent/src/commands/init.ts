import { Command } from "commander";
import chalk from "chalk";
import { runAction } from "../cli/errors";
import { initProjectContext } from "../cli/init-cli";

export function createInitCommand(): Command {
	return new Command("init")
		.description("Create .finch/context.md; new sessions in the directory start with it")
		.argument("[path]", "Project directory", ".")
		.action((dir: string) =>
			runAction("init project", async () => {
				const created = await initProjectContext(dir);
				process.stdout.write(`${chalk.green("✓")} Created ${created}\n`);
			}),
		);
}
