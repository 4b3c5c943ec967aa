import { Command } from "commander";
import { registerAgentCommands } from "./commands/agent.ts";
import { registerConfigCommands } from "./commands/config.ts";
import { registerServerCommand } from "./commands/server.ts";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("repo-agents")
    .description("Run GitHub-aware AI agents from the command line or over REST")
    .version("0.1.0");

  registerConfigCommands(program);
  registerAgentCommands(program);
  registerServerCommand(program);

  return program;
}
