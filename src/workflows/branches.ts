import { parseBranchList } from "../git/listings.js";

import {
  buildArgs,
  rawResult,
  requireText,
  runOperation,
  streams,
  type WorkflowContext,
} from "./context.js";
import type {
  CheckoutResult,
  ListResult,
  OperationOptions,
  Outcome,
  RawResult,
} from "./types.js";

export type BranchOptions = OperationOptions & {
  newBranch?: string;
  deleteBranch?: string;
  // Delete with -D even when the branch is not merged.
  force?: boolean;
  includeRemote?: boolean;
};

export type CheckoutOptions = OperationOptions & {
  target: string;
  createBranch?: boolean;
  // Restore only these paths from the target.
  files?: string[];
};

export function branch(
  ctx: WorkflowContext,
  options: BranchOptions = {},
): Outcome<ListResult<"branches"> | RawResult> {
  return runOperation<ListResult<"branches"> | RawResult>(ctx, "branch", options, async ({ git }) => {
    if (options.deleteBranch) {
      const res = await git(["branch", options.force ? "-D" : "-d", options.deleteBranch]);
      return rawResult("branch", res, res.success ? `Deleted branch ${options.deleteBranch}` : undefined);
    }

    if (options.newBranch) {
      const res = await git(["branch", options.newBranch]);
      return rawResult("branch", res, res.success ? `Created branch ${options.newBranch}` : undefined);
    }

    const res = await git(buildArgs("branch", options.includeRemote && "-a"));
    if (!res.success) {
      return rawResult("branch", res);
    }

    const branches = parseBranchList(res.stdout);
    const current = branches.find((entry) => entry.current);

    return {
      kind: "list",
      operation: "branch",
      success: true,
      listKind: "branches",
      items: branches,
      count: branches.length,
      currentBranch: current?.name,
      ...streams(res),
    };
  });
}

export function checkout(
  ctx: WorkflowContext,
  options: CheckoutOptions,
): Outcome<CheckoutResult | RawResult> {
  return runOperation<CheckoutResult | RawResult>(ctx, "checkout", options, async ({ git }) => {
    const target = requireText(options.target, "Checkout target");
    const files = options.files ?? [];

    const res = await git(
      buildArgs(
        "checkout",
        options.createBranch && "-b",
        target,
        ...(files.length > 0 ? ["--", ...files] : []),
      ),
    );
    if (!res.success) {
      return rawResult("checkout", res);
    }

    const current = await git(["branch", "--show-current"]);

    return {
      kind: "checkout",
      operation: "checkout",
      success: true,
      currentBranch: current.stdout,
      ...streams(res),
    };
  });
}
