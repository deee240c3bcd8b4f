import { PreconditionError } from "../core/errors.js";
import { parseStashList } from "../git/listings.js";

import { buildArgs, rawResult, runOperation, streams, type WorkflowContext } from "./context.js";
import type { ListResult, OperationOptions, Outcome, RawResult } from "./types.js";

export type StashOperation = "push" | "pop" | "apply" | "list" | "drop" | "clear";

export type StashOptions = OperationOptions & {
  // Matched case-insensitively.
  operation: string;
  message?: string;
  stashRef?: string;
  includeUntracked?: boolean;
};

const STASH_OPERATIONS: readonly StashOperation[] = ["push", "pop", "apply", "list", "drop", "clear"];

export function stash(
  ctx: WorkflowContext,
  options: StashOptions,
): Outcome<ListResult<"stashes"> | RawResult> {
  return runOperation<ListResult<"stashes"> | RawResult>(ctx, "stash", options, async ({ git }) => {
    const operation = parseStashOperation(options.operation);

    switch (operation) {
      case "push": {
        const message = options.message?.trim();
        const res = await git(
          buildArgs("stash", "push", options.includeUntracked && "-u", message && "-m", message),
        );
        return rawResult("stash", res);
      }
      case "pop":
      case "apply":
      case "drop": {
        const res = await git(buildArgs("stash", operation, options.stashRef));
        return rawResult("stash", res);
      }
      case "clear": {
        const res = await git(["stash", "clear"]);
        return rawResult("stash", res, res.success ? "All stashes cleared" : undefined);
      }
      case "list": {
        const res = await git(["stash", "list"]);
        if (!res.success) {
          return rawResult("stash", res);
        }

        const entries = parseStashList(res.stdout);
        return {
          kind: "list",
          operation: "stash",
          success: true,
          listKind: "stashes",
          items: entries,
          count: entries.length,
          ...streams(res),
        };
      }
    }
  });
}

export function parseStashOperation(value: string): StashOperation {
  const normalized = value.trim().toLowerCase();
  const operation = STASH_OPERATIONS.find((candidate) => candidate === normalized);
  if (!operation) {
    throw new PreconditionError(
      `Unknown stash operation: ${value}. Use one of ${STASH_OPERATIONS.join(", ")}`,
    );
  }
  return operation;
}
