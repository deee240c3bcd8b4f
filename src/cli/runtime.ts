/*
Purpose: shared plumbing for every operation subcommand (config, logging, cancellation, output).
Assumptions: one operation per process; SIGINT/SIGTERM cancel it rather than killing the CLI outright.
Usage: registerMergeCommands(program, createOperationRunner());
*/

import path from "node:path";

import type { Command } from "commander";

import type { ConductorConfig } from "../core/config.js";
import { loadConfigForCli } from "../core/config-loader.js";
import { JsonlLogger } from "../core/logger.js";
import { defaultSessionId } from "../core/utils.js";
import { createGitWorkflows, type GitWorkflows, type WorkflowOverrides } from "../workflows/index.js";
import type { OperationOptions, OperationResult } from "../workflows/types.js";

import {
  formatEnvelope,
  resolveEnvelopeExitCode,
  stdoutWriter,
  type OutputWriter,
} from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalCliOptions = {
  repo?: string;
  config?: string;
  logFile?: string;
  compact?: boolean;
  debug?: boolean;
};

export type WorkflowInvoker = (
  workflows: GitWorkflows,
  base: OperationOptions,
) => Promise<OperationResult>;

export type OperationRunner = (command: Command, invoke: WorkflowInvoker) => Promise<void>;

export type CliDependencies = {
  createWorkflows?: (config: ConductorConfig, overrides: WorkflowOverrides) => GitWorkflows;
  write?: OutputWriter;
  cwd?: () => string;
};

const CANCEL_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createOperationRunner(deps: CliDependencies = {}): OperationRunner {
  const createWorkflows = deps.createWorkflows ?? createGitWorkflows;
  const write = deps.write ?? stdoutWriter;
  const cwd = deps.cwd ?? (() => process.cwd());

  return async (command, invoke) => {
    const globals = command.optsWithGlobals<GlobalCliOptions>();
    const searchFrom = globals.repo ? path.resolve(cwd(), globals.repo) : cwd();
    const { config } = loadConfigForCli({ explicitPath: globals.config, cwd: searchFrom });

    const logFile = globals.logFile ? path.resolve(cwd(), globals.logFile) : config.log_file;
    const logger = logFile ? new JsonlLogger(logFile, { sessionId: defaultSessionId() }) : undefined;

    const controller = new AbortController();
    const detachSignals = abortOnSignals(controller);

    try {
      const workflows = createWorkflows(config, { logger, cwd });
      const result = await invoke(workflows, { repoPath: globals.repo, signal: controller.signal });

      write(`${formatEnvelope(result, { compact: globals.compact })}\n`);
      const exitCode = resolveEnvelopeExitCode(result);
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    } finally {
      detachSignals();
      logger?.close();
    }
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function abortOnSignals(controller: AbortController): () => void {
  const onSignal = (): void => {
    controller.abort();
  };

  for (const signal of CANCEL_SIGNALS) {
    process.once(signal, onSignal);
  }

  return () => {
    for (const signal of CANCEL_SIGNALS) {
      process.off(signal, onSignal);
    }
  };
}
