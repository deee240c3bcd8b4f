import { PreconditionError } from "../core/errors.js";
import { parseRemoteList } from "../git/listings.js";

import { buildArgs, rawResult, runOperation, streams, type WorkflowContext } from "./context.js";
import type { ListResult, OperationOptions, Outcome, RawResult } from "./types.js";

export type PushOptions = OperationOptions & {
  remote?: string;
  branch?: string;
  force?: boolean;
  setUpstream?: boolean;
  tags?: boolean;
};

export type FetchOptions = OperationOptions & {
  remote?: string;
  all?: boolean;
  prune?: boolean;
};

export type RemoteOptions = OperationOptions & {
  addName?: string;
  addUrl?: string;
  removeName?: string;
};

export function push(ctx: WorkflowContext, options: PushOptions = {}): Outcome<RawResult> {
  return runOperation<RawResult>(ctx, "push", options, async ({ git }) => {
    const res = await git(
      buildArgs(
        "push",
        options.force && "--force",
        options.setUpstream && "--set-upstream",
        options.tags && "--tags",
        options.remote || ctx.settings.defaultRemote,
        options.branch,
      ),
    );
    return rawResult("push", res);
  });
}

export function fetch(ctx: WorkflowContext, options: FetchOptions = {}): Outcome<RawResult> {
  return runOperation<RawResult>(ctx, "fetch", options, async ({ git }) => {
    const res = await git(
      buildArgs(
        "fetch",
        options.all ? "--all" : options.remote || ctx.settings.defaultRemote,
        options.prune && "--prune",
      ),
    );
    return rawResult("fetch", res);
  });
}

export function remote(
  ctx: WorkflowContext,
  options: RemoteOptions = {},
): Outcome<ListResult<"remotes"> | RawResult> {
  return runOperation<ListResult<"remotes"> | RawResult>(ctx, "remote", options, async ({ git }) => {
    if (options.addName) {
      if (!options.addUrl) {
        throw new PreconditionError(`A URL is required to add remote ${options.addName}`);
      }
      const res = await git(["remote", "add", options.addName, options.addUrl]);
      return rawResult("remote", res, res.success ? `Added remote ${options.addName}` : undefined);
    }

    if (options.removeName) {
      const res = await git(["remote", "remove", options.removeName]);
      return rawResult(
        "remote",
        res,
        res.success ? `Removed remote ${options.removeName}` : undefined,
      );
    }

    const res = await git(["remote", "-v"]);
    if (!res.success) {
      return rawResult("remote", res);
    }

    const remotes = parseRemoteList(res.stdout);
    return {
      kind: "list",
      operation: "remote",
      success: true,
      listKind: "remotes",
      items: remotes,
      count: remotes.length,
      ...streams(res),
    };
  });
}
