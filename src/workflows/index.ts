import type { ConductorConfig } from "../core/config.js";
import { noopLogger, type EventLogger } from "../core/logger.js";
import { createGitRunner, type GitRunner } from "../git/git.js";
import { RepoLocks } from "../git/repo-locks.js";
import { BackupFileWriter, type ResolvedContentWriter } from "../services/file-writer.js";

import { branch, checkout, type BranchOptions, type CheckoutOptions } from "./branches.js";
import type { WorkflowContext } from "./context.js";
import { diff, log, type DiffOptions, type LogOptions } from "./history.js";
import {
  abortMerge,
  continueMerge,
  getConflicts,
  merge,
  pull,
  resolveConflict,
  type ContinueMergeOptions,
  type MergeOptions,
  type PullOptions,
  type ResolveConflictOptions,
} from "./merge.js";
import {
  fetch,
  push,
  remote,
  type FetchOptions,
  type PushOptions,
  type RemoteOptions,
} from "./remotes.js";
import { stash, type StashOptions } from "./stash.js";
import { add, commit, status, type AddOptions, type CommitOptions } from "./status.js";
import type { OperationOptions } from "./types.js";

export type GitWorkflows = ReturnType<typeof bindWorkflows>;

export type WorkflowOverrides = {
  runner?: GitRunner;
  writer?: ResolvedContentWriter;
  logger?: EventLogger;
  cwd?: () => string;
};

export function createWorkflowContext(
  config: ConductorConfig,
  overrides: WorkflowOverrides = {},
): WorkflowContext {
  const logger = overrides.logger ?? noopLogger;

  return {
    runner:
      overrides.runner ??
      createGitRunner({
        binary: config.git_binary,
        timeoutMs: config.command_timeout_ms,
        logger,
      }),
    writer:
      overrides.writer ??
      new BackupFileWriter({
        backupsEnabled: config.backups.enabled,
        backupDir: config.backups.dir,
      }),
    settings: {
      defaultRemote: config.default_remote,
      diffMaxChars: config.diff_max_chars,
      conflictPreviewChars: config.conflict_preview_chars,
    },
    locks: config.serialize_repo_operations ? new RepoLocks() : null,
    logger,
    cwd: overrides.cwd,
  };
}

export function createGitWorkflows(
  config: ConductorConfig,
  overrides: WorkflowOverrides = {},
): GitWorkflows {
  return bindWorkflows(createWorkflowContext(config, overrides));
}

export function bindWorkflows(ctx: WorkflowContext) {
  return {
    status: (options: OperationOptions = {}) => status(ctx, options),
    add: (options: AddOptions) => add(ctx, options),
    commit: (options: CommitOptions) => commit(ctx, options),
    branch: (options: BranchOptions = {}) => branch(ctx, options),
    checkout: (options: CheckoutOptions) => checkout(ctx, options),
    pull: (options: PullOptions = {}) => pull(ctx, options),
    push: (options: PushOptions = {}) => push(ctx, options),
    merge: (options: MergeOptions) => merge(ctx, options),
    getConflicts: (options: OperationOptions = {}) => getConflicts(ctx, options),
    resolveConflict: (options: ResolveConflictOptions) => resolveConflict(ctx, options),
    abortMerge: (options: OperationOptions = {}) => abortMerge(ctx, options),
    continueMerge: (options: ContinueMergeOptions = {}) => continueMerge(ctx, options),
    log: (options: LogOptions = {}) => log(ctx, options),
    diff: (options: DiffOptions = {}) => diff(ctx, options),
    remote: (options: RemoteOptions = {}) => remote(ctx, options),
    fetch: (options: FetchOptions = {}) => fetch(ctx, options),
    stash: (options: StashOptions) => stash(ctx, options),
  };
}
