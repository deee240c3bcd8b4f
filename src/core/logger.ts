import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  session_id: string;
  operation?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  sessionId?: string;
  operation?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  sessionId?: string;
};

// Anything that accepts events; workflows only need this much of a logger.
export type EventLogger = {
  log(event: LogEventInput): void;
};

export type GitCommandOutcome = "exited" | "cancelled" | "timed_out" | "spawn_failed";

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export const noopLogger: EventLogger = {
  log: () => undefined,
};

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { sessionId: providedSessionId, operation, payload, ts, type, ...rest } = event;

  const sessionId = providedSessionId ?? defaults.sessionId;
  if (!sessionId) {
    throw new Error("session_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    session_id: sessionId,
  };

  if (operation) {
    result.operation = operation;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logOperationEvent(
  logger: EventLogger,
  type: "operation.start" | "operation.finish" | "operation.fault",
  operation: string,
  payload: JsonObject = {},
): void {
  logger.log({ type, operation, payload });
}

export function logGitCommand(
  logger: EventLogger,
  details: {
    args: string[];
    cwd: string;
    exitCode: number | null;
    durationMs: number;
    outcome: GitCommandOutcome;
  },
): void {
  logger.log({
    type: "git.command",
    payload: {
      args: details.args,
      cwd: details.cwd,
      exit_code: details.exitCode,
      duration_ms: details.durationMs,
      outcome: details.outcome,
    },
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
