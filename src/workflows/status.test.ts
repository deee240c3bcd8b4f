import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  createFakeGitRunner,
  createTestContext,
  respondByPrefix,
} from "../__tests__/helpers/fake-git-runner.js";

import { add, commit, status } from "./status.js";

const OID = "0123456789abcdef0123456789abcdef01234567";

let repoDir = "";

beforeEach(() => {
  repoDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "status-workflow-")));
});

afterEach(() => {
  fs.rmSync(repoDir, { recursive: true, force: true });
});

describe("status", () => {
  it("combines the parsed porcelain output with the human-readable text", async () => {
    const runner = createFakeGitRunner(
      respondByPrefix({
        "status --porcelain=v2 --branch": {
          stdout: [
            "# branch.head main",
            "# branch.upstream origin/main",
            "# branch.ab +2 -0",
            `1 .M N... 100644 100644 100644 ${OID} ${OID} app.ts`,
            "? scratch.txt",
          ].join("\n"),
        },
        status: { stdout: "On branch main" },
      }),
    );

    const result = await status(createTestContext(runner), { repoPath: repoDir });

    expect(runner.commands()).toEqual(["status --porcelain=v2 --branch", "status"]);
    expect(result).toEqual({
      kind: "status",
      operation: "status",
      success: true,
      status: {
        branch: "main",
        upstream: "origin/main",
        ahead: 2,
        behind: 0,
        staged: [],
        unstaged: [{ path: "app.ts", kind: "modified" }],
        untracked: ["scratch.txt"],
        conflicted: [],
        rawStatus: "On branch main",
        isClean: false,
      },
    });
  });

  it("returns the git failure when the directory is not a repository", async () => {
    const runner = createFakeGitRunner(() => ({
      exitCode: 128,
      stderr: "fatal: not a git repository (or any of the parent directories): .git",
    }));

    const result = await status(createTestContext(runner), { repoPath: repoDir });

    expect(result).toEqual({
      kind: "raw",
      operation: "status",
      success: false,
      errors: "fatal: not a git repository (or any of the parent directories): .git",
    });
    expect(runner.calls).toHaveLength(1);
  });
});

describe("add", () => {
  it("stages with -A by default and lists the staged files", async () => {
    const runner = createFakeGitRunner(
      respondByPrefix({
        "status --porcelain=v2": {
          stdout: [
            `1 A. N... 000000 100644 100644 ${OID} ${OID} a.txt`,
            `1 .M N... 100644 100644 100644 ${OID} ${OID} b.txt`,
          ].join("\n"),
        },
      }),
    );

    const result = await add(createTestContext(runner), { repoPath: repoDir, files: ["a.txt"] });

    expect(runner.commands()).toEqual(["add -A -- a.txt", "status --porcelain=v2"]);
    expect(result).toEqual({
      kind: "list",
      operation: "add",
      success: true,
      listKind: "staged",
      items: ["a.txt"],
      count: 1,
      message: "1 file(s) staged",
    });
  });

  it("omits -A when deletions are excluded", async () => {
    const runner = createFakeGitRunner();

    await add(createTestContext(runner), {
      repoPath: repoDir,
      files: ["src", "docs/readme.md"],
      includeDeleted: false,
    });

    expect(runner.commands()[0]).toBe("add -- src docs/readme.md");
  });

  it("requires at least one path", async () => {
    const runner = createFakeGitRunner();

    const result = await add(createTestContext(runner), { repoPath: repoDir, files: [" "] });

    expect(result.kind).toBe("failure");
    expect(result.message).toBe("At least one file or pathspec is required");
    expect(runner.calls).toEqual([]);
  });
});

describe("commit", () => {
  it("passes the message as a single argument and returns both hashes", async () => {
    const runner = createFakeGitRunner(
      respondByPrefix({
        commit: { stdout: "[main abc1234] fix: handle \"quotes\" and $vars" },
        "rev-parse HEAD": { stdout: "abc1234def5678abc1234def5678abc1234def567" },
        "rev-parse --short HEAD": { stdout: "abc1234" },
      }),
    );

    const result = await commit(createTestContext(runner), {
      repoPath: repoDir,
      message: 'fix: handle "quotes" and $vars',
      all: true,
      allowEmpty: true,
    });

    expect(runner.calls[0]?.args).toEqual([
      "commit",
      "-a",
      "--allow-empty",
      "-m",
      'fix: handle "quotes" and $vars',
    ]);
    expect(result).toEqual({
      kind: "commit",
      operation: "commit",
      success: true,
      commitHash: "abc1234def5678abc1234def5678abc1234def567",
      shortHash: "abc1234",
      message: "Committed abc1234",
      output: "[main abc1234] fix: handle \"quotes\" and $vars",
    });
  });

  it("does not look up hashes when the commit fails", async () => {
    const runner = createFakeGitRunner(
      respondByPrefix({ commit: { exitCode: 1, stdout: "nothing to commit, working tree clean" } }),
    );

    const result = await commit(createTestContext(runner), { repoPath: repoDir, message: "empty" });

    expect(result).toEqual({
      kind: "raw",
      operation: "commit",
      success: false,
      output: "nothing to commit, working tree clean",
    });
    expect(runner.calls).toHaveLength(1);
  });

  it("requires a message", async () => {
    const runner = createFakeGitRunner();

    const result = await commit(createTestContext(runner), { repoPath: repoDir, message: "" });

    expect(result.message).toBe("Commit message is required");
    expect(runner.calls).toEqual([]);
  });
});
