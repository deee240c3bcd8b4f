#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { resolveDebugFlagFromArgv } from "./core/logger.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<{ debug?: boolean }>().debug);
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    // Commander already printed its own usage message.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? 1 : error.exitCode;
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;

  // npm installs the bin as a symlink; compare against the real file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
