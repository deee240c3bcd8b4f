// Parses `git status --porcelain=v2 --branch` into a RepositoryStatus snapshot.

// =============================================================================
// TYPES
// =============================================================================

export type FileStatusKind =
  | "added"
  | "modified"
  | "deleted"
  | "renamed"
  | "copied"
  | "unmerged"
  | "unknown";

export type FileStatus = {
  path: string;
  kind: FileStatusKind;
};

export type RepositoryStatus = {
  branch: string;
  upstream?: string;
  ahead: number;
  behind: number;
  staged: FileStatus[];
  unstaged: FileStatus[];
  untracked: string[];
  conflicted: string[];
  rawStatus?: string;
};

export type AheadBehind = {
  ahead: number;
  behind: number;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const STATUS_CODES: Readonly<Record<string, FileStatusKind>> = {
  M: "modified",
  A: "added",
  D: "deleted",
  R: "renamed",
  C: "copied",
  U: "unmerged",
};

const AHEAD_BEHIND_PATTERN = /#\s*branch\.ab\s*\+(\d+)\s*-(\d+)/;

// Header field counts before the path, per record type.
const ORDINARY_HEADER_FIELDS = 8;
const RENAME_HEADER_FIELDS = 9;
const UNMERGED_HEADER_FIELDS = 10;

const UNCHANGED = ".";

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseStatusCode(code: string): FileStatusKind {
  return STATUS_CODES[code] ?? "unknown";
}

export function parseAheadBehind(line: string): AheadBehind | null {
  const match = AHEAD_BEHIND_PATTERN.exec(line);
  if (!match) return null;

  return { ahead: Number.parseInt(match[1], 10), behind: Number.parseInt(match[2], 10) };
}

export function parseStatusPorcelainV2(output: string): RepositoryStatus {
  const status: RepositoryStatus = {
    branch: "",
    ahead: 0,
    behind: 0,
    staged: [],
    unstaged: [],
    untracked: [],
    conflicted: [],
  };

  for (const rawLine of output.split("\n")) {
    const line = rawLine.replace(/\r$/, "");
    if (line.length === 0) continue;

    if (line.startsWith("# branch.head ")) {
      status.branch = lastField(line);
    } else if (line.startsWith("# branch.upstream ")) {
      status.upstream = lastField(line);
    } else if (line.startsWith("# branch.ab ")) {
      const counts = parseAheadBehind(line);
      if (counts) {
        status.ahead = counts.ahead;
        status.behind = counts.behind;
      }
    } else if (line.startsWith("1 ") || line.startsWith("2 ")) {
      const headerFields = line.startsWith("1 ") ? ORDINARY_HEADER_FIELDS : RENAME_HEADER_FIELDS;
      const change = parseChangeLine(line, headerFields);
      if (!change) continue;

      if (change.index !== UNCHANGED) {
        status.staged.push({ path: change.path, kind: parseStatusCode(change.index) });
      }
      if (change.worktree !== UNCHANGED) {
        status.unstaged.push({ path: change.path, kind: parseStatusCode(change.worktree) });
      }
    } else if (line.startsWith("? ")) {
      status.untracked.push(line.slice(2));
    } else if (line.startsWith("u ")) {
      const fields = line.split(" ");
      const pathFields = fields.slice(UNMERGED_HEADER_FIELDS);
      status.conflicted.push(pathFields.length > 0 ? pathFields.join(" ") : lastField(line));
    }
  }

  return status;
}

export function isCleanStatus(
  status: Pick<RepositoryStatus, "staged" | "unstaged" | "untracked" | "conflicted">,
): boolean {
  return (
    status.staged.length === 0 &&
    status.unstaged.length === 0 &&
    status.untracked.length === 0 &&
    status.conflicted.length === 0
  );
}

export function stagedPaths(status: Pick<RepositoryStatus, "staged">): string[] {
  return [...new Set(status.staged.map((entry) => entry.path))];
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseChangeLine(
  line: string,
  headerFields: number,
): { index: string; worktree: string; path: string } | null {
  const fields = line.split(" ");
  if (fields.length <= headerFields) return null;

  const xy = fields[1];
  if (xy.length !== 2) return null;

  // Rename records carry "<path>\t<origPath>"; keep the new path.
  const pathField = fields.slice(headerFields).join(" ");
  const path = pathField.split("\t")[0];

  return { index: xy[0], worktree: xy[1], path };
}

function lastField(line: string): string {
  const fields = line.trim().split(/\s+/);
  return fields[fields.length - 1];
}
