import type { Command } from "commander";

import type { OperationRunner } from "../runtime.js";

// =============================================================================
// TYPES
// =============================================================================

type LogCliOptions = {
  maxCount?: number;
  path?: string;
  author?: string;
  since?: string;
  oneline?: boolean;
};

type DiffCliOptions = {
  staged?: boolean;
  from?: string;
  to?: string;
  nameOnly?: boolean;
};

type StashCliOptions = {
  message?: string;
  ref?: string;
  includeUntracked?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerHistoryCommands(program: Command, run: OperationRunner): void {
  program
    .command("log")
    .description("Show recent commits")
    .option("-n, --max-count <n>", "Number of commits (default: 10)", (v: string) =>
      Number.parseInt(v, 10),
    )
    .option("--path <path>", "Only commits touching this path")
    .option("--author <pattern>", "Only commits by a matching author")
    .option("--since <date>", "Only commits after this date")
    .option("--oneline", "Compact one-line entries", false)
    .action(async (opts: LogCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.log({
          ...base,
          maxCount: opts.maxCount,
          path: opts.path,
          author: opts.author,
          since: opts.since,
          oneLine: opts.oneline,
        }),
      );
    });

  program
    .command("diff")
    .description("Show changes, optionally for one file or ref range")
    .argument("[file]", "Limit the diff to this file")
    .option("--staged", "Compare the index with HEAD", false)
    .option("--from <ref>", "Start of the ref range")
    .option("--to <ref>", "End of the ref range (with --from)")
    .option("--name-only", "List changed paths only", false)
    .action(async (file: string | undefined, opts: DiffCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.diff({
          ...base,
          file,
          staged: opts.staged,
          from: opts.from,
          to: opts.to,
          nameOnly: opts.nameOnly,
        }),
      );
    });

  program
    .command("stash")
    .description("push, pop, apply, list, drop or clear stashes")
    .argument("<operation>", "Stash operation")
    .option("-m, --message <text>", "Message for push")
    .option("--ref <stash>", "Entry for pop, apply or drop (e.g. stash@{1})")
    .option("-u, --include-untracked", "Include untracked files in push", false)
    .action(async (operation: string, opts: StashCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.stash({
          ...base,
          operation,
          message: opts.message,
          stashRef: opts.ref,
          includeUntracked: opts.includeUntracked,
        }),
      );
    });
}
