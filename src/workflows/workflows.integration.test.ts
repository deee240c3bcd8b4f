import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../__tests__/helpers/temp-git-repo.js";
import { defaultConductorConfig } from "../core/config.js";

import { createGitWorkflows, type GitWorkflows } from "./index.js";

let repo: TempGitRepo;
let workflows: GitWorkflows;

beforeEach(async () => {
  repo = await createTempGitRepo();
  workflows = createGitWorkflows({
    ...defaultConductorConfig(),
    backups: { enabled: false, dir: repo.repoDir },
  });
});

afterEach(async () => {
  await repo.cleanup();
});

async function divergeOnFile(): Promise<void> {
  await repo.writeFile("a.txt", "base\n");
  await repo.commit("base");

  await repo.git(["checkout", "-b", "feature"]);
  await repo.writeFile("a.txt", "feature\n");
  await repo.commit("feature change");

  await repo.git(["checkout", "main"]);
  await repo.writeFile("a.txt", "main\n");
  await repo.commit("main change");
}

describe("workflows against a real repository", () => {
  it("reports a fresh repository as clean on main", async () => {
    const result = await workflows.status({ repoPath: repo.repoDir });

    expect(result.kind).toBe("status");
    if (result.kind !== "status") return;
    expect(result.status.branch).toBe("main");
    expect(result.status.isClean).toBe(true);
    expect(result.message).toBe("Working tree clean");
  });

  it("stages and commits a file", async () => {
    await repo.writeFile("a.txt", "hello\n");

    const added = await workflows.add({ repoPath: repo.repoDir, files: ["a.txt"] });
    expect(added).toMatchObject({ kind: "list", listKind: "staged", items: ["a.txt"], count: 1 });

    const committed = await workflows.commit({ repoPath: repo.repoDir, message: "init" });
    expect(committed.kind).toBe("commit");
    if (committed.kind !== "commit") return;

    const head = (await repo.git(["rev-parse", "HEAD"])).trim();
    expect(committed.commitHash).toBe(head);
    expect(head.startsWith(committed.shortHash)).toBe(true);
    expect(committed.message).toBe(`Committed ${committed.shortHash}`);
  });

  it("aborts a conflicting merge when asked and leaves the tree clean", async () => {
    await divergeOnFile();

    const merged = await workflows.merge({
      repoPath: repo.repoDir,
      branch: "feature",
      abortOnConflict: true,
    });
    expect(merged).toMatchObject({ kind: "aborted", success: false, hadConflicts: true });

    const after = await workflows.status({ repoPath: repo.repoDir });
    expect(after.kind).toBe("status");
    if (after.kind !== "status") return;
    expect(after.status.conflicted).toEqual([]);
    expect(after.status.isClean).toBe(true);
    expect(await repo.readFile("a.txt")).toBe("main\n");
  });

  it("walks a conflict through inspection, resolution and completion", async () => {
    await divergeOnFile();

    const merged = await workflows.merge({ repoPath: repo.repoDir, branch: "feature" });
    expect(merged).toMatchObject({ kind: "conflict", conflictedFiles: ["a.txt"] });

    const conflicts = await workflows.getConflicts({ repoPath: repo.repoDir });
    expect(conflicts.kind).toBe("conflicts");
    if (conflicts.kind !== "conflicts") return;
    expect(conflicts.conflicts[0]?.sections.map(({ ours, theirs }) => ({ ours, theirs }))).toEqual([
      { ours: "main", theirs: "feature" },
    ]);

    const blocked = await workflows.continueMerge({ repoPath: repo.repoDir });
    expect(blocked.message).toBe("Cannot continue: unresolved conflicts remain");

    const resolved = await workflows.resolveConflict({
      repoPath: repo.repoDir,
      filePath: "a.txt",
      strategy: "theirs",
    });
    expect(resolved.message).toBe("Resolved a.txt using theirs");

    const completed = await workflows.continueMerge({
      repoPath: repo.repoDir,
      message: "merge feature",
    });
    expect(completed).toMatchObject({ success: true, message: "Merge completed" });
    expect(await repo.readFile("a.txt")).toBe("feature\n");

    const subject = await repo.git(["log", "-1", "--format=%s"]);
    expect(subject).toBe("merge feature");
  });

  it("stashes and lists local changes", async () => {
    await repo.writeFile("a.txt", "one\n");
    await repo.commit("first");
    await repo.writeFile("a.txt", "two\n");

    const pushed = await workflows.stash({
      repoPath: repo.repoDir,
      operation: "push",
      message: "wip",
    });
    expect(pushed.success).toBe(true);
    expect(await repo.readFile("a.txt")).toBe("one\n");

    const listed = await workflows.stash({ repoPath: repo.repoDir, operation: "list" });
    expect(listed.kind).toBe("list");
    if (listed.kind !== "list") return;
    expect(listed.items).toEqual([{ ref: "stash@{0}", branch: "main", message: "wip" }]);
  });

  it("reads history and the working tree diff", async () => {
    await repo.writeFile("a.txt", "one\n");
    await repo.commit("first commit");
    await repo.writeFile("a.txt", "two\n");
    await repo.commit("second commit");
    await repo.writeFile("a.txt", "three\n");

    const history = await workflows.log({ repoPath: repo.repoDir });
    expect(history.kind).toBe("list");
    if (history.kind !== "list" || history.listKind !== "commits") return;
    expect(history.items.map((entry) => entry.message)).toEqual(["second commit", "first commit"]);
    expect(history.items[0]?.author).toBe("conductor-test");

    const changes = await workflows.diff({ repoPath: repo.repoDir, nameOnly: true });
    expect(changes).toMatchObject({ kind: "list", listKind: "files", items: ["a.txt"] });
  });

  it("reports an already-cancelled signal without touching the repository", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await workflows.status({ repoPath: repo.repoDir, signal: controller.signal });

    expect(result).toMatchObject({ kind: "failure", reason: "cancelled", success: false });
  });
});
