import { PreconditionError } from "../core/errors.js";
import { truncateText } from "../core/utils.js";
import {
  COMMIT_LOG_FORMAT,
  parseCommitLog,
  parseNameList,
  parseOnelineLog,
} from "../git/listings.js";

import { buildArgs, rawResult, runOperation, type WorkflowContext } from "./context.js";
import type { DiffResult, ListResult, OperationOptions, Outcome, RawResult } from "./types.js";

export type LogOptions = OperationOptions & {
  maxCount?: number;
  path?: string;
  author?: string;
  since?: string;
  oneLine?: boolean;
};

export type DiffOptions = OperationOptions & {
  staged?: boolean;
  file?: string;
  from?: string;
  // Only used together with `from`.
  to?: string;
  nameOnly?: boolean;
};

export const DEFAULT_LOG_COUNT = 10;
export const DIFF_TRUNCATION_SUFFIX = "\n... (truncated, use file parameter for specific file)";

export function log(
  ctx: WorkflowContext,
  options: LogOptions = {},
): Outcome<ListResult<"commits"> | ListResult<"oneline"> | RawResult> {
  return runOperation<ListResult<"commits"> | ListResult<"oneline"> | RawResult>(
    ctx,
    "log",
    options,
    async ({ git }) => {
      const maxCount = options.maxCount ?? DEFAULT_LOG_COUNT;
      if (!Number.isInteger(maxCount) || maxCount < 1) {
        throw new PreconditionError(`maxCount must be a positive integer (received ${maxCount})`);
      }

      const res = await git(
        buildArgs(
          "log",
          `--max-count=${maxCount}`,
          options.oneLine ? "--oneline" : `--format=${COMMIT_LOG_FORMAT}`,
          options.author && `--author=${options.author}`,
          options.since && `--since=${options.since}`,
          ...(options.path ? ["--", options.path] : []),
        ),
      );
      if (!res.success) {
        return rawResult("log", res);
      }

      if (options.oneLine) {
        const entries = parseOnelineLog(res.stdout);
        return {
          kind: "list",
          operation: "log",
          success: true,
          listKind: "oneline",
          items: entries,
          count: entries.length,
          output: res.stdout,
        };
      }

      const commits = parseCommitLog(res.stdout);
      return {
        kind: "list",
        operation: "log",
        success: true,
        listKind: "commits",
        items: commits,
        count: commits.length,
      };
    },
  );
}

export function diff(
  ctx: WorkflowContext,
  options: DiffOptions = {},
): Outcome<DiffResult | ListResult<"files"> | RawResult> {
  return runOperation<DiffResult | ListResult<"files"> | RawResult>(
    ctx,
    "diff",
    options,
    async ({ git }) => {
      const selection = buildArgs(
        options.staged && "--staged",
        options.from,
        options.from && options.to,
        ...(options.file ? ["--", options.file] : []),
      );

      if (options.nameOnly) {
        const res = await git(["diff", "--name-only", ...selection]);
        if (!res.success) {
          return rawResult("diff", res);
        }

        const files = parseNameList(res.stdout);
        return {
          kind: "list",
          operation: "diff",
          success: true,
          listKind: "files",
          items: files,
          count: files.length,
        };
      }

      const res = await git(["diff", ...selection]);
      if (!res.success) {
        return rawResult("diff", res);
      }

      const stats = await git(["diff", "--stat", ...selection]);
      const capped = truncateText(res.stdout, ctx.settings.diffMaxChars, DIFF_TRUNCATION_SUFFIX);

      return {
        kind: "diff",
        operation: "diff",
        success: true,
        diff: capped.text,
        stats: stats.stdout,
        truncated: capped.truncated,
        message: res.stdout.length === 0 ? "No differences" : undefined,
        ...(res.stderr.length > 0 ? { errors: res.stderr } : {}),
      };
    },
  );
}
