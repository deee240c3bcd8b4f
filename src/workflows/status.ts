import { PreconditionError } from "../core/errors.js";
import { isCleanStatus, parseStatusPorcelainV2, stagedPaths } from "../git/status.js";

import {
  buildArgs,
  rawResult,
  requireText,
  runOperation,
  streams,
  type WorkflowContext,
} from "./context.js";
import type {
  CommitResult,
  ListResult,
  OperationOptions,
  Outcome,
  RawResult,
  StatusResult,
} from "./types.js";

export type AddOptions = OperationOptions & {
  files: string[];
  // Stage deletions too (`git add -A`).
  includeDeleted?: boolean;
};

export type CommitOptions = OperationOptions & {
  message: string;
  all?: boolean;
  amend?: boolean;
  allowEmpty?: boolean;
};

export function status(ctx: WorkflowContext, options: OperationOptions = {}): Outcome<StatusResult | RawResult> {
  return runOperation<StatusResult | RawResult>(ctx, "status", options, async ({ git }) => {
    const porcelain = await git(["status", "--porcelain=v2", "--branch"]);
    if (!porcelain.success) {
      return rawResult("status", porcelain);
    }

    const human = await git(["status"]);
    const parsed = parseStatusPorcelainV2(porcelain.stdout);
    const isClean = isCleanStatus(parsed);

    return {
      kind: "status",
      operation: "status",
      success: true,
      message: isClean ? "Working tree clean" : undefined,
      status: { ...parsed, rawStatus: human.stdout, isClean },
    };
  });
}

export function add(ctx: WorkflowContext, options: AddOptions): Outcome<ListResult<"staged"> | RawResult> {
  return runOperation<ListResult<"staged"> | RawResult>(ctx, "add", options, async ({ git }) => {
    const files = options.files.filter((file) => file.trim().length > 0);
    if (files.length === 0) {
      throw new PreconditionError("At least one file or pathspec is required");
    }

    const includeDeleted = options.includeDeleted ?? true;
    const res = await git(buildArgs("add", includeDeleted && "-A", "--", ...files));
    if (!res.success) {
      return rawResult("add", res);
    }

    const after = await git(["status", "--porcelain=v2"]);
    const staged = stagedPaths(parseStatusPorcelainV2(after.stdout));

    return {
      kind: "list",
      operation: "add",
      success: true,
      listKind: "staged",
      items: staged,
      count: staged.length,
      message: `${staged.length} file(s) staged`,
      ...streams(res),
    };
  });
}

export function commit(ctx: WorkflowContext, options: CommitOptions): Outcome<CommitResult | RawResult> {
  return runOperation<CommitResult | RawResult>(ctx, "commit", options, async ({ git }) => {
    const message = requireText(options.message, "Commit message");

    const res = await git(
      buildArgs(
        "commit",
        options.all && "-a",
        options.amend && "--amend",
        options.allowEmpty && "--allow-empty",
        "-m",
        message,
      ),
    );
    if (!res.success) {
      return rawResult("commit", res);
    }

    const full = await git(["rev-parse", "HEAD"]);
    const short = await git(["rev-parse", "--short", "HEAD"]);

    return {
      kind: "commit",
      operation: "commit",
      success: true,
      commitHash: full.stdout,
      shortHash: short.stdout,
      message: `Committed ${short.stdout}`,
      ...streams(res),
    };
  });
}
