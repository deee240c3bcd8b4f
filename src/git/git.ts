/*
Purpose: run the git binary as a subprocess and normalize what it prints.
Assumptions: arguments are passed as a vector (no shell), so user text such as commit
messages never needs quoting. Output is read as UTF-8 and trimmed.
Usage: const runner = createGitRunner({ timeoutMs: 60_000 });
       const res = await runner.run({ args: ["status"], cwd: repoDir, signal });
*/

import { execa, ExecaError } from "execa";

import { CommandCancelledError, CommandSpawnError, CommandTimeoutError } from "../core/errors.js";
import {
  logGitCommand,
  noopLogger,
  type EventLogger,
  type GitCommandOutcome,
} from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitCommandResult = {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type GitInvocation = {
  args: string[];
  cwd: string;
  signal?: AbortSignal;
};

export interface GitRunner {
  run(invocation: GitInvocation): Promise<GitCommandResult>;
}

export type GitRunnerOptions = {
  binary?: string;
  // 0 or undefined: no timeout.
  timeoutMs?: number;
  logger?: EventLogger;
  env?: Record<string, string>;
};

type StopReason = "cancelled" | "timed_out";

type ChildHandle = {
  pid?: number;
  kill(signal: NodeJS.Signals): boolean;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const GIT_ENV: Readonly<Record<string, string>> = {
  LC_ALL: "C",
  LANG: "C",
  GIT_TERMINAL_PROMPT: "0",
  GIT_PAGER: "cat",
  GIT_MERGE_AUTOEDIT: "no",
};

const FORCE_KILL_DELAY_MS = 5_000;
const CONFLICT_KEYWORD = "CONFLICT";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitRunner(options: GitRunnerOptions = {}): GitRunner {
  const binary = options.binary ?? "git";
  const timeoutMs = options.timeoutMs ?? 0;
  const logger = options.logger ?? noopLogger;
  const env = { ...GIT_ENV, ...options.env };

  return {
    run: (invocation) => runGit({ binary, timeoutMs, logger, env }, invocation),
  };
}

export function reportsConflict(result: Pick<GitCommandResult, "stdout" | "stderr">): boolean {
  return result.stdout.includes(CONFLICT_KEYWORD) || result.stderr.includes(CONFLICT_KEYWORD);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runGit(
  settings: { binary: string; timeoutMs: number; logger: EventLogger; env: Record<string, string> },
  invocation: GitInvocation,
): Promise<GitCommandResult> {
  const { binary, timeoutMs, logger, env } = settings;
  const { args, cwd, signal } = invocation;
  const commandLabel = `${binary} ${args.join(" ")}`;

  if (signal?.aborted) {
    throw new CommandCancelledError(`${commandLabel} was cancelled before it started`);
  }

  const startedAt = Date.now();
  const subprocess = execa(binary, args, {
    cwd,
    env,
    stdin: "ignore",
    encoding: "utf8",
    // Own process group on POSIX so the whole tree can be signalled.
    detached: process.platform !== "win32",
  });

  const stopState: { reason: StopReason | null; termination: Promise<void> | null } = {
    reason: null,
    termination: null,
  };

  const stop = (reason: StopReason): void => {
    if (stopState.reason) return;
    stopState.reason = reason;
    stopState.termination = terminateProcessTree(subprocess, Promise.allSettled([subprocess]));
  };

  const onAbort = (): void => stop("cancelled");
  signal?.addEventListener("abort", onAbort, { once: true });
  const timer = timeoutMs > 0 ? setTimeout(() => stop("timed_out"), timeoutMs) : null;

  const finish = (exitCode: number | null, outcome: GitCommandOutcome): void =>
    logGitCommand(logger, { args, cwd, exitCode, durationMs: Date.now() - startedAt, outcome });

  try {
    const result = await subprocess;
    finish(result.exitCode ?? 0, "exited");
    return {
      success: true,
      exitCode: result.exitCode ?? 0,
      stdout: toText(result.stdout).trim(),
      stderr: toText(result.stderr).trim(),
    };
  } catch (err) {
    if (stopState.reason === "cancelled") {
      finish(null, "cancelled");
      throw new CommandCancelledError(`${commandLabel} was cancelled`, err);
    }
    if (stopState.reason === "timed_out") {
      finish(null, "timed_out");
      throw new CommandTimeoutError(
        timeoutMs,
        `${commandLabel} timed out after ${timeoutMs}ms`,
        err,
      );
    }

    if (err instanceof ExecaError && typeof err.exitCode === "number") {
      finish(err.exitCode, "exited");
      return {
        success: err.exitCode === 0,
        exitCode: err.exitCode,
        stdout: toText(err.stdout).trim(),
        stderr: toText(err.stderr).trim(),
      };
    }

    finish(null, "spawn_failed");
    throw new CommandSpawnError(binary, describeSpawnFailure(binary, cwd, err), err);
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (timer) clearTimeout(timer);
    if (stopState.termination) await stopState.termination;
  }
}

async function terminateProcessTree(child: ChildHandle, settled: Promise<unknown>): Promise<void> {
  const pid = child.pid;
  if (pid === undefined) return;

  if (process.platform === "win32") {
    const res = await execa("taskkill", ["/pid", String(pid), "/t", "/f"], { reject: false });
    if (res.exitCode !== 0) {
      child.kill("SIGKILL");
    }
    return;
  }

  signalGroup(pid, "SIGTERM", child);

  // Escalate if git ignores SIGTERM (for example while a credential helper hangs).
  const escalation = setTimeout(() => signalGroup(pid, "SIGKILL", child), FORCE_KILL_DELAY_MS);
  try {
    await settled;
  } finally {
    clearTimeout(escalation);
  }
}

function signalGroup(pid: number, signal: NodeJS.Signals, child: ChildHandle): void {
  try {
    process.kill(-pid, signal);
  } catch {
    // The group is gone or was never created; fall back to the direct child.
    child.kill(signal);
  }
}

function describeSpawnFailure(binary: string, cwd: string, err: unknown): string {
  const code = err instanceof ExecaError ? err.code : undefined;
  if (code === "ENOENT") {
    return `Could not start ${binary}: executable not found (cwd=${cwd})`;
  }
  if (code === "EACCES") {
    return `Could not start ${binary}: permission denied (cwd=${cwd})`;
  }

  const detail = err instanceof Error ? err.message : String(err);
  return `Could not start ${binary} (cwd=${cwd}): ${detail}`;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}
