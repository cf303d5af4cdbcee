/**
 * Interactive chat, the default command.
 */
import { Command } from "commander";
import { type ChatCommandArgs, runChatCommand } from "../cli/chat-cli";
import { runAction } from "../cli/errors";

export function createChatCommand(): Command {
	return new Command("chat")
		.description("Chat with the agent (resumes the current session unless --new)")
		.option("--host <url>", "Ollama host for this run (e.g. http://localhost:11434)")
		.option("--model <name>", "Model for this run")
		.option("--new", "Start a new session")
		.option("--resume <id>", "Resume a specific session")
		.option("--multi-agent", "Run an orchestrator that delegates to specialist agents")
		.action((options: ChatCommandArgs) => runAction("chat", () => runChatCommand(options)));
}
