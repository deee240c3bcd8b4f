import type { Command } from "commander";
import fse from "fs-extra";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../../core/errors.js";
import type { OperationRunner } from "../runtime.js";

// =============================================================================
// TYPES
// =============================================================================

type PullCliOptions = {
  remote?: string;
  branch?: string;
  rebase?: boolean;
  ffOnly?: boolean;
};

type MergeCliOptions = {
  // `--no-ff` sets this to false.
  ff: boolean;
  abortOnConflict?: boolean;
};

type ResolveCliOptions = {
  strategy: string;
  content?: string;
  contentFile?: string;
};

type ContinueMergeCliOptions = { message?: string };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerMergeCommands(program: Command, run: OperationRunner): void {
  program
    .command("pull")
    .description("Fetch and integrate a remote branch")
    .option("--remote <name>", "Remote to pull from (default: configured default remote)")
    .option("--branch <name>", "Remote branch to pull")
    .option("--rebase", "Rebase instead of merging", false)
    .option("--ff-only", "Refuse anything but a fast-forward", false)
    .action(async (opts: PullCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.pull({
          ...base,
          remote: opts.remote,
          branch: opts.branch,
          rebase: opts.rebase,
          fastForwardOnly: opts.ffOnly,
        }),
      );
    });

  program
    .command("merge")
    .description("Merge a branch into the current branch")
    .argument("<branch>", "Branch to merge")
    .option("--no-ff", "Always create a merge commit")
    .option("--abort-on-conflict", "Run merge --abort when conflicts are reported", false)
    .action(async (branch: string, opts: MergeCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.merge({
          ...base,
          branch,
          noFastForward: !opts.ff,
          abortOnConflict: opts.abortOnConflict,
        }),
      );
    });

  program
    .command("conflicts")
    .description("Show conflicted files with their conflict sections")
    .action(async (_opts: object, command: Command) => {
      await run(command, (workflows, base) => workflows.getConflicts(base));
    });

  program
    .command("resolve")
    .description("Resolve one conflicted file and stage it")
    .argument("<file>", "Conflicted file, relative to the repository")
    .requiredOption("--strategy <strategy>", "ours, theirs or manual")
    .option("--content <text>", "Resolved content for the manual strategy")
    .option("--content-file <path>", "Read resolved content for the manual strategy from a file")
    .action(async (file: string, opts: ResolveCliOptions, command: Command) => {
      await run(command, async (workflows, base) =>
        workflows.resolveConflict({
          ...base,
          filePath: file,
          strategy: opts.strategy,
          resolvedContent: await readResolvedContent(opts),
        }),
      );
    });

  program
    .command("abort-merge")
    .description("Abandon the merge in progress")
    .action(async (_opts: object, command: Command) => {
      await run(command, (workflows, base) => workflows.abortMerge(base));
    });

  program
    .command("continue-merge")
    .description("Commit the merge once every conflict is resolved")
    .option("-m, --message <text>", "Commit message (default: the prepared merge message)")
    .action(async (opts: ContinueMergeCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.continueMerge({ ...base, message: opts.message }),
      );
    });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readResolvedContent(opts: ResolveCliOptions): Promise<string | undefined> {
  if (opts.content !== undefined && opts.contentFile !== undefined) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Conflicting options",
      message: "Use either --content or --content-file, not both.",
    });
  }
  if (opts.contentFile === undefined) {
    return opts.content;
  }

  try {
    return await fse.readFile(opts.contentFile, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Cannot read resolved content",
      message: `Failed to read ${opts.contentFile}.`,
      hint: "Check the --content-file path.",
      cause: err,
    });
  }
}
