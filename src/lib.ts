// Public entry point for embedding the workflows in another process.

export {
  bindWorkflows,
  createGitWorkflows,
  createWorkflowContext,
  type GitWorkflows,
  type WorkflowOverrides,
} from "./workflows/index.js";
export type { WorkflowContext, WorkflowSettings } from "./workflows/context.js";
export type {
  AbortedResult,
  AnyListResult,
  CheckoutResult,
  CommitResult,
  ConflictResult,
  ConflictsReport,
  DiffResult,
  FailureReason,
  FailureResult,
  ListItems,
  ListKind,
  ListResult,
  OperationName,
  OperationOptions,
  OperationResult,
  Outcome,
  RawResult,
  StatusResult,
  StatusSnapshot,
} from "./workflows/types.js";
export type { BranchOptions, CheckoutOptions } from "./workflows/branches.js";
export type { DiffOptions, LogOptions } from "./workflows/history.js";
export type {
  ContinueMergeOptions,
  MergeOptions,
  PullOptions,
  ResolveConflictOptions,
  ResolveStrategy,
} from "./workflows/merge.js";
export type { FetchOptions, PushOptions, RemoteOptions } from "./workflows/remotes.js";
export type { StashOperation, StashOptions } from "./workflows/stash.js";
export type { AddOptions, CommitOptions } from "./workflows/status.js";

export {
  createGitRunner,
  reportsConflict,
  type GitCommandResult,
  type GitInvocation,
  type GitRunner,
} from "./git/git.js";
export { RepoLocks } from "./git/repo-locks.js";
export {
  parseAheadBehind,
  parseStatusCode,
  parseStatusPorcelainV2,
  type FileStatus,
  type FileStatusKind,
  type RepositoryStatus,
} from "./git/status.js";
export {
  buildConflictDetail,
  parseConflictSections,
  type ConflictDetail,
  type ConflictSection,
} from "./git/conflicts.js";
export {
  parseBranchList,
  parseCommitLog,
  parseNameList,
  parseOnelineLog,
  parseRemoteList,
  parseStashList,
  type BranchEntry,
  type CommitEntry,
  type OnelineEntry,
  type RemoteEntry,
  type StashEntry,
} from "./git/listings.js";

export {
  ConductorConfigSchema,
  defaultConductorConfig,
  type ConductorConfig,
} from "./core/config.js";
export { loadConductorConfig, loadConfigForCli } from "./core/config-loader.js";
export {
  CommandCancelledError,
  CommandSpawnError,
  CommandTimeoutError,
  ConductorError,
  ConfigError,
  GitError,
  PreconditionError,
  UserFacingError,
} from "./core/errors.js";
export { JsonlLogger, noopLogger, type EventLogger, type LogEventInput } from "./core/logger.js";

export {
  BackupFileWriter,
  type ResolvedContentWriter,
  type WriteResult,
} from "./services/file-writer.js";
export {
  AnalysisSession,
  type AnalysisWorkspace,
  type DependencyEdge,
  type ReferenceLocation,
  type SymbolLocation,
  type WorkspaceLoader,
} from "./services/analysis-session.js";
