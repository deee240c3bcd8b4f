import type { ConflictDetail } from "../git/conflicts.js";
import type {
  BranchEntry,
  CommitEntry,
  OnelineEntry,
  RemoteEntry,
  StashEntry,
} from "../git/listings.js";
import type { RepositoryStatus } from "../git/status.js";

// =============================================================================
// OPERATIONS
// =============================================================================

export type OperationName =
  | "status"
  | "pull"
  | "push"
  | "commit"
  | "add"
  | "branch"
  | "checkout"
  | "merge"
  | "getConflicts"
  | "resolveConflict"
  | "abortMerge"
  | "continueMerge"
  | "log"
  | "diff"
  | "remote"
  | "fetch"
  | "stash";

export type OperationOptions = {
  // Defaults to the process working directory; a file path resolves to its directory.
  repoPath?: string;
  signal?: AbortSignal;
};

// =============================================================================
// RESULT ENVELOPES
// =============================================================================

type EnvelopeBase = {
  operation: OperationName;
  success: boolean;
  message?: string;
  output?: string;
  errors?: string;
};

export type RawResult = EnvelopeBase & { kind: "raw" };

export type StatusSnapshot = RepositoryStatus & { isClean: boolean };

export type StatusResult = EnvelopeBase & {
  kind: "status";
  status: StatusSnapshot;
};

export type CommitResult = EnvelopeBase & {
  kind: "commit";
  commitHash: string;
  shortHash: string;
};

export type CheckoutResult = EnvelopeBase & {
  kind: "checkout";
  // Empty when HEAD is detached.
  currentBranch: string;
};

export type DiffResult = EnvelopeBase & {
  kind: "diff";
  diff: string;
  stats: string;
  truncated: boolean;
};

export type ListItems = {
  branches: BranchEntry[];
  remotes: RemoteEntry[];
  commits: CommitEntry[];
  oneline: OnelineEntry[];
  stashes: StashEntry[];
  files: string[];
  staged: string[];
};

export type ListKind = keyof ListItems;

export type ListResult<K extends ListKind> = EnvelopeBase & {
  kind: "list";
  listKind: K;
  items: ListItems[K];
  count: number;
  currentBranch?: string;
};

export type AnyListResult = { [K in ListKind]: ListResult<K> }[ListKind];

export type ConflictResult = EnvelopeBase & {
  kind: "conflict";
  success: false;
  hasConflicts: true;
  conflictedFiles: string[];
  suggestion: string;
};

export type AbortedResult = EnvelopeBase & {
  kind: "aborted";
  success: false;
  hadConflicts: true;
};

export type ConflictsReport = EnvelopeBase & {
  kind: "conflicts";
  hasConflicts: boolean;
  conflicts: ConflictDetail[];
  // Number of entries in `conflicts`.
  count: number;
  // Conflicted paths with no file in the working tree (deleted on one side).
  deletedFiles?: string[];
  suggestion?: string;
};

export type FailureReason = "invocation" | "cancelled" | "timeout" | "precondition" | "fault";

export type FailureResult = EnvelopeBase & {
  kind: "failure";
  success: false;
  reason: FailureReason;
  message: string;
};

export type OperationResult =
  | RawResult
  | StatusResult
  | CommitResult
  | CheckoutResult
  | DiffResult
  | AnyListResult
  | ConflictResult
  | AbortedResult
  | ConflictsReport
  | FailureResult;

// Every operation may also come back as a failure envelope.
export type Outcome<T extends OperationResult> = Promise<T | FailureResult>;
