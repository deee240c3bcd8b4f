import type { Command } from "commander";

import type { OperationRunner } from "../runtime.js";

// =============================================================================
// TYPES
// =============================================================================

type AddCliOptions = { deleted: boolean };

type CommitCliOptions = {
  message: string;
  all?: boolean;
  amend?: boolean;
  allowEmpty?: boolean;
};

type BranchCliOptions = {
  create?: string;
  delete?: string;
  force?: boolean;
  all?: boolean;
};

type CheckoutCliOptions = { create?: boolean };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerWorkingTreeCommands(program: Command, run: OperationRunner): void {
  program
    .command("status")
    .description("Show branch, tracking and file status")
    .action(async (_opts: object, command: Command) => {
      await run(command, (workflows, base) => workflows.status(base));
    });

  program
    .command("add")
    .description("Stage files or pathspecs")
    .argument("<files...>", "Files or pathspecs to stage")
    .option("--no-deleted", "Do not stage deletions (omit -A)")
    .action(async (files: string[], opts: AddCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.add({ ...base, files, includeDeleted: opts.deleted }),
      );
    });

  program
    .command("commit")
    .description("Record staged changes")
    .requiredOption("-m, --message <text>", "Commit message")
    .option("-a, --all", "Stage tracked changes before committing", false)
    .option("--amend", "Amend the previous commit", false)
    .option("--allow-empty", "Allow a commit with no changes", false)
    .action(async (opts: CommitCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.commit({
          ...base,
          message: opts.message,
          all: opts.all,
          amend: opts.amend,
          allowEmpty: opts.allowEmpty,
        }),
      );
    });

  program
    .command("branch")
    .description("List, create or delete branches")
    .option("--create <name>", "Create a branch without switching to it")
    .option("--delete <name>", "Delete a branch (takes precedence over --create)")
    .option("-f, --force", "Delete even when the branch is not merged", false)
    .option("-a, --all", "Include remote-tracking branches in the list", false)
    .action(async (opts: BranchCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.branch({
          ...base,
          newBranch: opts.create,
          deleteBranch: opts.delete,
          force: opts.force,
          includeRemote: opts.all,
        }),
      );
    });

  program
    .command("checkout")
    .description("Switch branches or restore files from a ref")
    .argument("<target>", "Branch, tag or commit")
    .argument("[files...]", "Restore only these paths")
    .option("-b, --create", "Create the branch first", false)
    .action(
      async (target: string, files: string[], opts: CheckoutCliOptions, command: Command) => {
        await run(command, (workflows, base) =>
          workflows.checkout({ ...base, target, files, createBranch: opts.create }),
        );
      },
    );
}
