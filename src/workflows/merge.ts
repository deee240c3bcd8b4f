import path from "node:path";

import fse from "fs-extra";

import { PreconditionError } from "../core/errors.js";
import { isPathInside } from "../core/utils.js";
import { buildConflictDetail, type ConflictDetail } from "../git/conflicts.js";
import { reportsConflict, type GitCommandResult } from "../git/git.js";
import { parseNameList } from "../git/listings.js";

import {
  buildArgs,
  rawResult,
  requireText,
  runOperation,
  streams,
  type OperationScope,
  type WorkflowContext,
} from "./context.js";
import type {
  AbortedResult,
  ConflictResult,
  ConflictsReport,
  OperationName,
  OperationOptions,
  Outcome,
  RawResult,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PullOptions = OperationOptions & {
  remote?: string;
  branch?: string;
  rebase?: boolean;
  fastForwardOnly?: boolean;
};

export type MergeOptions = OperationOptions & {
  branch: string;
  noFastForward?: boolean;
  // Run `git merge --abort` as soon as a conflict is reported.
  abortOnConflict?: boolean;
};

export type ResolveStrategy = "ours" | "theirs" | "manual";

export type ResolveConflictOptions = OperationOptions & {
  filePath: string;
  // Matched case-insensitively against ours / theirs / manual.
  strategy: string;
  resolvedContent?: string | null;
};

export type ContinueMergeOptions = OperationOptions & {
  message?: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const CONFLICT_SUGGESTION =
  "Resolve each file with resolveConflict (ours, theirs or manual content) and then run " +
  "continueMerge, or back out with abortMerge.";

const RESOLVE_STRATEGIES: readonly ResolveStrategy[] = ["ours", "theirs", "manual"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function pull(
  ctx: WorkflowContext,
  options: PullOptions = {},
): Outcome<ConflictResult | RawResult> {
  return runOperation<ConflictResult | RawResult>(ctx, "pull", options, async (scope) => {
    const remote = options.remote || ctx.settings.defaultRemote;
    const res = await scope.git(
      buildArgs(
        "pull",
        options.rebase && "--rebase",
        options.fastForwardOnly && "--ff-only",
        remote,
        options.branch,
      ),
    );

    if (reportsConflict(res)) {
      return conflictReport(scope, "pull", res, "Pull stopped on conflicts");
    }
    return rawResult("pull", res);
  });
}

export function merge(
  ctx: WorkflowContext,
  options: MergeOptions,
): Outcome<ConflictResult | AbortedResult | RawResult> {
  return runOperation<ConflictResult | AbortedResult | RawResult>(
    ctx,
    "merge",
    options,
    async (scope) => {
      const branch = requireText(options.branch, "Branch to merge");
      const res = await scope.git(buildArgs("merge", options.noFastForward && "--no-ff", branch));

      if (!reportsConflict(res)) {
        return rawResult("merge", res);
      }

      if (!options.abortOnConflict) {
        return conflictReport(scope, "merge", res, `Merging ${branch} produced conflicts`);
      }

      const abort = await scope.git(["merge", "--abort"]);
      const aborted: AbortedResult = {
        kind: "aborted",
        operation: "merge",
        success: false,
        hadConflicts: true,
        message: abort.success
          ? `Merging ${branch} produced conflicts; the merge was aborted`
          : `Merging ${branch} produced conflicts and the abort failed`,
        ...streams(res),
      };
      if (!abort.success) {
        aborted.errors = [res.stderr, abort.stderr].filter((text) => text.length > 0).join("\n");
      }
      return aborted;
    },
  );
}

export function getConflicts(
  ctx: WorkflowContext,
  options: OperationOptions = {},
): Outcome<ConflictsReport | RawResult> {
  return runOperation<ConflictsReport | RawResult>(ctx, "getConflicts", options, async (scope) => {
    const listing = await listConflictedFiles(scope);
    if (!listing.result.success) {
      return rawResult("getConflicts", listing.result);
    }

    if (listing.files.length === 0) {
      return {
        kind: "conflicts",
        operation: "getConflicts",
        success: true,
        hasConflicts: false,
        conflicts: [],
        count: 0,
        message: "No conflicts found",
      };
    }

    const conflicts: ConflictDetail[] = [];
    const deletedFiles: string[] = [];
    for (const file of listing.files) {
      const absolutePath = path.join(scope.cwd, file);
      // Deleted-on-one-side conflicts have no file to read.
      if (!(await fse.pathExists(absolutePath))) {
        deletedFiles.push(file);
        continue;
      }

      const content = await fse.readFile(absolutePath, "utf8");
      conflicts.push(buildConflictDetail(file, content, ctx.settings.conflictPreviewChars));
    }

    const report: ConflictsReport = {
      kind: "conflicts",
      operation: "getConflicts",
      success: true,
      hasConflicts: true,
      conflicts,
      count: conflicts.length,
      message: `${listing.files.length} conflicted file(s)`,
      suggestion: CONFLICT_SUGGESTION,
    };
    if (deletedFiles.length > 0) report.deletedFiles = deletedFiles;
    return report;
  });
}

export function resolveConflict(
  ctx: WorkflowContext,
  options: ResolveConflictOptions,
): Outcome<RawResult> {
  return runOperation<RawResult>(ctx, "resolveConflict", options, async (scope) => {
    const strategy = parseResolveStrategy(options.strategy);
    const filePath = requireText(options.filePath, "File path");

    let manualContent: string | null = null;
    if (strategy === "manual") {
      // Empty content counts as missing.
      if (!options.resolvedContent) {
        throw new PreconditionError("Resolved content is required for the manual strategy");
      }
      manualContent = options.resolvedContent;
    }

    const absolutePath = path.resolve(scope.cwd, filePath);
    if (!isPathInside(scope.cwd, absolutePath)) {
      throw new PreconditionError(`File is outside the repository: ${filePath}`);
    }
    if (!(await fse.pathExists(absolutePath))) {
      throw new PreconditionError(`File not found: ${filePath}`);
    }
    const relativePath = path.relative(scope.cwd, absolutePath);

    if (manualContent !== null) {
      await ctx.writer.writeResolvedContent(absolutePath, manualContent);
    } else {
      const checkout = await scope.git(["checkout", `--${strategy}`, "--", relativePath]);
      if (!checkout.success) {
        return rawResult("resolveConflict", checkout);
      }
    }

    const staged = await scope.git(["add", "--", relativePath]);
    return rawResult(
      "resolveConflict",
      staged,
      staged.success ? `Resolved ${relativePath} using ${strategy}` : undefined,
    );
  });
}

export function abortMerge(ctx: WorkflowContext, options: OperationOptions = {}): Outcome<RawResult> {
  return runOperation<RawResult>(ctx, "abortMerge", options, async ({ git }) => {
    const res = await git(["merge", "--abort"]);
    return rawResult("abortMerge", res, res.success ? "Merge aborted" : undefined);
  });
}

export function continueMerge(
  ctx: WorkflowContext,
  options: ContinueMergeOptions = {},
): Outcome<ConflictResult | RawResult> {
  return runOperation<ConflictResult | RawResult>(ctx, "continueMerge", options, async (scope) => {
    const listing = await listConflictedFiles(scope);
    if (!listing.result.success) {
      return rawResult("continueMerge", listing.result);
    }

    if (listing.files.length > 0) {
      return {
        kind: "conflict",
        operation: "continueMerge",
        success: false,
        hasConflicts: true,
        conflictedFiles: listing.files,
        suggestion: CONFLICT_SUGGESTION,
        message: "Cannot continue: unresolved conflicts remain",
      };
    }

    const message = options.message?.trim();
    const res = await scope.git(
      message ? ["commit", "-m", message] : ["commit", "--no-edit"],
    );
    return rawResult("continueMerge", res, res.success ? "Merge completed" : undefined);
  });
}

export function parseResolveStrategy(value: string): ResolveStrategy {
  const normalized = value.trim().toLowerCase();
  const strategy = RESOLVE_STRATEGIES.find((candidate) => candidate === normalized);
  if (!strategy) {
    throw new PreconditionError(
      `Unknown strategy: ${value}. Use 'ours', 'theirs', or 'manual'`,
    );
  }
  return strategy;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listConflictedFiles(
  scope: OperationScope,
): Promise<{ result: GitCommandResult; files: string[] }> {
  const result = await scope.git(["diff", "--name-only", "--diff-filter=U"]);
  return { result, files: result.success ? parseNameList(result.stdout) : [] };
}

async function conflictReport(
  scope: OperationScope,
  operation: OperationName,
  res: GitCommandResult,
  message: string,
): Promise<ConflictResult> {
  const listing = await listConflictedFiles(scope);
  return {
    kind: "conflict",
    operation,
    success: false,
    hasConflicts: true,
    conflictedFiles: listing.files,
    suggestion: CONFLICT_SUGGESTION,
    message,
    ...streams(res),
  };
}
