// Parsers for the list-shaped git outputs: stashes, remotes, branches, logs and path lists.

// =============================================================================
// TYPES
// =============================================================================

export type StashEntry = {
  ref: string;
  branch: string;
  message: string;
};

export type RemoteDirection = "fetch" | "push";

export type RemoteEntry = {
  name: string;
  url: string;
  direction: RemoteDirection;
};

export type BranchEntry = {
  name: string;
  current: boolean;
  remote: boolean;
};

export type CommitEntry = {
  hash: string;
  shortHash: string;
  author: string;
  email: string;
  date: string;
  message: string;
};

export type OnelineEntry = {
  shortHash: string;
  message: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const STASH_LINE_PATTERN = /^(stash@\{\d+\}):\s*(?:WIP on|On)\s*([^:]+):\s*(.*)$/;
const REMOTE_LINE_PATTERN = /^(\S+)\s+(\S+)\s+\((fetch|push)\)$/;
const ONELINE_PATTERN = /^([a-fA-F0-9]+) (.*)$/;

const FIELD_SEPARATOR = "\x1f";

// Passed as --format; fields are joined by the unit separator so subjects may contain "|".
export const COMMIT_LOG_FORMAT = ["%H", "%h", "%an", "%ae", "%ai", "%s"].join("%x1f");

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseStashList(output: string): StashEntry[] {
  const entries: StashEntry[] = [];

  for (const line of splitLines(output)) {
    const match = STASH_LINE_PATTERN.exec(line);
    if (!match) continue;

    entries.push({ ref: match[1], branch: match[2].trim(), message: match[3].trim() });
  }

  return entries;
}

export function parseRemoteList(output: string): RemoteEntry[] {
  const entries: RemoteEntry[] = [];
  const seen = new Set<string>();

  for (const line of splitLines(output)) {
    const match = REMOTE_LINE_PATTERN.exec(line);
    if (!match) continue;

    const direction: RemoteDirection = match[3] === "push" ? "push" : "fetch";
    const key = `${match[1]}\0${direction}`;
    if (seen.has(key)) continue;
    seen.add(key);

    entries.push({ name: match[1], url: match[2], direction });
  }

  return entries;
}

export function parseBranchList(output: string): BranchEntry[] {
  const entries: BranchEntry[] = [];

  for (const line of splitLines(output)) {
    const current = line.startsWith("*");
    const content = line.replace(/^\*?\s*/, "");
    if (content.length === 0) continue;

    // "remotes/origin/HEAD -> origin/main" names the symbolic ref itself.
    const name = content.split(" -> ")[0];
    entries.push({ name, current, remote: name.startsWith("remotes/") });
  }

  return entries;
}

export function parseCommitLog(output: string): CommitEntry[] {
  const entries: CommitEntry[] = [];

  for (const line of splitLines(output)) {
    const fields = line.split(FIELD_SEPARATOR);
    if (fields.length < 6) continue;

    const [hash, shortHash, author, email, date, ...messageParts] = fields;
    entries.push({
      hash,
      shortHash,
      author,
      email,
      date,
      message: messageParts.join(FIELD_SEPARATOR),
    });
  }

  return entries;
}

export function parseOnelineLog(output: string): OnelineEntry[] {
  const entries: OnelineEntry[] = [];

  for (const line of splitLines(output)) {
    const match = ONELINE_PATTERN.exec(line);
    if (!match) continue;

    entries.push({ shortHash: match[1].toLowerCase(), message: match[2] });
  }

  return entries;
}

export function parseNameList(output: string): string[] {
  return splitLines(output)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.trim().length > 0);
}
