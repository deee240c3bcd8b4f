import { Command } from "commander";

import { registerHistoryCommands } from "./commands/history.js";
import { registerMergeCommands } from "./commands/merge.js";
import { registerRemoteCommands } from "./commands/remotes.js";
import { registerWorkingTreeCommands } from "./commands/working-tree.js";
import { createOperationRunner, type CliDependencies } from "./runtime.js";

export const CLI_VERSION = "0.1.0";

export function buildCli(deps: CliDependencies = {}): Command {
  const program = new Command();
  const run = createOperationRunner(deps);

  program
    .name("git-conductor")
    .description("Run git workflows and print structured JSON results")
    .version(CLI_VERSION)
    .option("--repo <path>", "Repository (or a file inside it) to operate on (default: cwd)")
    .option(
      "--config <path>",
      "Override config path (defaults to <repo>/.git-conductor/config.yaml, then built-in defaults)",
    )
    .option("--log-file <path>", "Append JSONL operation events to this file")
    .option("--compact", "Print single-line JSON", false)
    .option("--debug", "Show error details and stack traces", false);

  registerWorkingTreeCommands(program, run);
  registerMergeCommands(program, run);
  registerRemoteCommands(program, run);
  registerHistoryCommands(program, run);

  return program;
}
