import type { Command } from "commander";

import type { OperationRunner } from "../runtime.js";

type PushCliOptions = {
  remote?: string;
  branch?: string;
  force?: boolean;
  setUpstream?: boolean;
  tags?: boolean;
};

type FetchCliOptions = {
  remote?: string;
  all?: boolean;
  prune?: boolean;
};

type RemoteCliOptions = {
  add?: string;
  url?: string;
  remove?: string;
};

export function registerRemoteCommands(program: Command, run: OperationRunner): void {
  program
    .command("push")
    .description("Push the current or given branch")
    .option("--remote <name>", "Remote to push to (default: configured default remote)")
    .option("--branch <name>", "Branch to push")
    .option("-f, --force", "Force the update", false)
    .option("-u, --set-upstream", "Record the remote branch as upstream", false)
    .option("--tags", "Push tags as well", false)
    .action(async (opts: PushCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.push({
          ...base,
          remote: opts.remote,
          branch: opts.branch,
          force: opts.force,
          setUpstream: opts.setUpstream,
          tags: opts.tags,
        }),
      );
    });

  program
    .command("fetch")
    .description("Download objects and refs from a remote")
    .option("--remote <name>", "Remote to fetch (default: configured default remote)")
    .option("--all", "Fetch every remote", false)
    .option("--prune", "Drop remote-tracking refs that no longer exist", false)
    .action(async (opts: FetchCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.fetch({ ...base, remote: opts.remote, all: opts.all, prune: opts.prune }),
      );
    });

  program
    .command("remote")
    .description("List, add or remove remotes")
    .option("--add <name>", "Add a remote with this name (requires --url)")
    .option("--url <url>", "URL for --add")
    .option("--remove <name>", "Remove a remote")
    .action(async (opts: RemoteCliOptions, command: Command) => {
      await run(command, (workflows, base) =>
        workflows.remote({
          ...base,
          addName: opts.add,
          addUrl: opts.url,
          removeName: opts.remove,
        }),
      );
    });
}
