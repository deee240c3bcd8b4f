import path from "node:path";

import fse from "fs-extra";

import { findRepoRoot } from "../core/config-discovery.js";
import {
  CommandCancelledError,
  CommandSpawnError,
  CommandTimeoutError,
  PreconditionError,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOperationEvent, type EventLogger } from "../core/logger.js";
import type { GitCommandResult, GitRunner } from "../git/git.js";
import type { RepoLocks } from "../git/repo-locks.js";
import type { ResolvedContentWriter } from "../services/file-writer.js";

import type {
  FailureReason,
  FailureResult,
  OperationName,
  OperationOptions,
  OperationResult,
  RawResult,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type WorkflowSettings = {
  defaultRemote: string;
  diffMaxChars: number;
  conflictPreviewChars: number;
};

export type WorkflowContext = {
  runner: GitRunner;
  writer: ResolvedContentWriter;
  settings: WorkflowSettings;
  // null: callers are responsible for not overlapping mutating operations.
  locks: RepoLocks | null;
  logger: EventLogger;
  cwd?: () => string;
};

export type OperationScope = {
  cwd: string;
  signal?: AbortSignal;
  git: (args: string[]) => Promise<GitCommandResult>;
};

type ArgPart = string | false | null | undefined;

// =============================================================================
// OPERATION BOUNDARY
// =============================================================================

export async function runOperation<T extends OperationResult>(
  ctx: WorkflowContext,
  operation: OperationName,
  options: OperationOptions,
  body: (scope: OperationScope) => Promise<T>,
): Promise<T | FailureResult> {
  logOperationEvent(ctx.logger, "operation.start", operation, {
    repo_path: options.repoPath ?? null,
  });

  try {
    const cwd = await resolveWorkingDirectory(options.repoPath, ctx.cwd);
    const scope: OperationScope = {
      cwd,
      signal: options.signal,
      git: (args) => ctx.runner.run({ args, cwd, signal: options.signal }),
    };

    const execute = (): Promise<T> => body(scope);
    // Subdirectories of one repository share the root's lock.
    const result = ctx.locks
      ? await ctx.locks.withLock(findRepoRoot(cwd) ?? cwd, execute)
      : await execute();

    logOperationEvent(ctx.logger, "operation.finish", operation, {
      kind: result.kind,
      success: result.success,
    });
    return result;
  } catch (err) {
    const failure = toFailure(operation, err);
    logOperationEvent(ctx.logger, "operation.fault", operation, {
      reason: failure.reason,
      message: failure.message,
    });
    return failure;
  }
}

export async function resolveWorkingDirectory(
  repoPath: string | undefined,
  cwd: () => string = () => process.cwd(),
): Promise<string> {
  const target = repoPath && repoPath.trim().length > 0 ? path.resolve(repoPath) : cwd();

  const stat = await fse.stat(target).catch((err: unknown) => {
    throw new PreconditionError(`Repository path not found: ${target}`, err);
  });

  return stat.isFile() ? path.dirname(target) : target;
}

export function toFailure(operation: OperationName, err: unknown): FailureResult {
  const reason = classifyFailure(err);
  const message =
    reason === "fault"
      ? `Error in git ${operation}: ${formatErrorMessage(err)}`
      : formatErrorMessage(err);

  return { kind: "failure", operation, success: false, reason, message };
}

// =============================================================================
// RESULT HELPERS
// =============================================================================

export function rawResult(
  operation: OperationName,
  res: GitCommandResult,
  message?: string,
): RawResult {
  const result: RawResult = { kind: "raw", operation, success: res.success, ...streams(res) };
  if (message) result.message = message;
  return result;
}

// Empty streams are left off so envelopes serialize without noise.
export function streams(res: GitCommandResult): { output?: string; errors?: string } {
  const fields: { output?: string; errors?: string } = {};
  if (res.stdout.length > 0) fields.output = res.stdout;
  if (res.stderr.length > 0) fields.errors = res.stderr;
  return fields;
}

export function buildArgs(...parts: ArgPart[]): string[] {
  return parts.filter((part): part is string => typeof part === "string" && part.length > 0);
}

export function requireText(value: string | undefined, label: string): string {
  if (value === undefined || value.trim().length === 0) {
    throw new PreconditionError(`${label} is required`);
  }
  return value;
}

// =============================================================================
// INTERNALS
// =============================================================================

function classifyFailure(err: unknown): FailureReason {
  if (err instanceof PreconditionError) return "precondition";
  if (err instanceof CommandCancelledError) return "cancelled";
  if (err instanceof CommandTimeoutError) return "timeout";
  if (err instanceof CommandSpawnError) return "invocation";
  return "fault";
}
