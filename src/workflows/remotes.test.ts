import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  TEST_SETTINGS,
  createFakeGitRunner,
  createTestContext,
  respondByPrefix,
} from "../__tests__/helpers/fake-git-runner.js";

import { fetch, push, remote } from "./remotes.js";

let repoDir = "";

beforeEach(() => {
  repoDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "remote-workflow-")));
});

afterEach(() => {
  fs.rmSync(repoDir, { recursive: true, force: true });
});

describe("push", () => {
  it("pushes to the configured default remote", async () => {
    const runner = createFakeGitRunner();
    const ctx = createTestContext(runner, {
      settings: { ...TEST_SETTINGS, defaultRemote: "upstream" },
    });

    await push(ctx, { repoPath: repoDir });

    expect(runner.commands()).toEqual(["push upstream"]);
  });

  it("places flags before the remote and branch", async () => {
    const runner = createFakeGitRunner();

    await push(createTestContext(runner), {
      repoPath: repoDir,
      remote: "fork",
      branch: "topic",
      force: true,
      setUpstream: true,
      tags: true,
    });

    expect(runner.commands()).toEqual(["push --force --set-upstream --tags fork topic"]);
  });

  it("returns a rejected push as an unsuccessful raw result", async () => {
    const runner = createFakeGitRunner(() => ({
      exitCode: 1,
      stderr: "! [rejected]        main -> main (fetch first)",
    }));

    const result = await push(createTestContext(runner), { repoPath: repoDir });

    expect(result).toEqual({
      kind: "raw",
      operation: "push",
      success: false,
      errors: "! [rejected]        main -> main (fetch first)",
    });
  });
});

describe("fetch", () => {
  it("fetches every remote and prunes", async () => {
    const runner = createFakeGitRunner();

    await fetch(createTestContext(runner), { repoPath: repoDir, all: true, remote: "x", prune: true });

    expect(runner.commands()).toEqual(["fetch --all --prune"]);
  });

  it("falls back to the default remote", async () => {
    const runner = createFakeGitRunner();

    await fetch(createTestContext(runner), { repoPath: repoDir });

    expect(runner.commands()).toEqual(["fetch origin"]);
  });
});

describe("remote", () => {
  it("lists each remote once per direction", async () => {
    const runner = createFakeGitRunner(
      respondByPrefix({
        "remote -v": {
          stdout: [
            "origin\tgit@example.com:team/app.git (fetch)",
            "origin\tgit@example.com:team/app.git (push)",
            "origin\tgit@example.com:team/app.git (push)",
          ].join("\n"),
        },
      }),
    );

    const result = await remote(createTestContext(runner), { repoPath: repoDir });

    expect(result.kind).toBe("list");
    if (result.kind !== "list") return;
    expect(result.items).toEqual([
      { name: "origin", url: "git@example.com:team/app.git", direction: "fetch" },
      { name: "origin", url: "git@example.com:team/app.git", direction: "push" },
    ]);
    expect(result.count).toBe(2);
  });

  it("adds a remote", async () => {
    const runner = createFakeGitRunner();

    const result = await remote(createTestContext(runner), {
      repoPath: repoDir,
      addName: "fork",
      addUrl: "https://example.com/fork.git",
    });

    expect(runner.commands()).toEqual(["remote add fork https://example.com/fork.git"]);
    expect(result.message).toBe("Added remote fork");
  });

  it("requires a url when adding", async () => {
    const runner = createFakeGitRunner();

    const result = await remote(createTestContext(runner), { repoPath: repoDir, addName: "fork" });

    expect(result).toEqual({
      kind: "failure",
      operation: "remote",
      success: false,
      reason: "precondition",
      message: "A URL is required to add remote fork",
    });
    expect(runner.calls).toEqual([]);
  });

  it("removes a remote", async () => {
    const runner = createFakeGitRunner();

    const result = await remote(createTestContext(runner), { repoPath: repoDir, removeName: "fork" });

    expect(runner.commands()).toEqual(["remote remove fork"]);
    expect(result.message).toBe("Removed remote fork");
  });
});
