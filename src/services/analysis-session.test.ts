import path from "node:path";

import { describe, expect, it } from "vitest";

import { PreconditionError } from "../core/errors.js";
import type { LogEventInput } from "../core/logger.js";

import { AnalysisSession, type AnalysisWorkspace } from "./analysis-session.js";

// =============================================================================
// HELPERS
// =============================================================================

type FakeWorkspace = AnalysisWorkspace & { rootPath: string; disposed: boolean };

function createFakeWorkspace(rootPath: string): FakeWorkspace {
  const workspace: FakeWorkspace = {
    rootPath,
    disposed: false,
    findSymbols: async (name) => [
      { name, kind: "function", filePath: path.join(rootPath, "main.ts"), line: 3, column: 17 },
    ],
    findReferences: async () => [],
    getDependencies: async () => [{ from: "main.ts", to: "util.ts" }],
    dispose: async () => {
      workspace.disposed = true;
    },
  };
  return workspace;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

// =============================================================================
// TESTS
// =============================================================================

describe("AnalysisSession", () => {
  it("rejects queries until a workspace is loaded", async () => {
    const session = new AnalysisSession(async (root) => createFakeWorkspace(root));

    expect(session.isLoaded).toBe(false);
    await expect(session.findSymbols("main")).rejects.toBeInstanceOf(PreconditionError);
    await expect(session.getDependencies()).rejects.toThrow(
      "No analysis workspace is loaded; call load() first",
    );
  });

  it("delegates queries to the loaded workspace", async () => {
    const root = path.resolve("project");
    const session = new AnalysisSession(async (rootPath) => createFakeWorkspace(rootPath));

    await session.load("project");

    expect(session.isLoaded).toBe(true);
    expect(session.rootPath).toBe(root);
    await expect(session.findSymbols("main")).resolves.toEqual([
      { name: "main", kind: "function", filePath: path.join(root, "main.ts"), line: 3, column: 17 },
    ]);
    await expect(session.getDependencies()).resolves.toEqual([{ from: "main.ts", to: "util.ts" }]);
  });

  it("runs one load at a time and disposes the replaced workspace", async () => {
    const created: FakeWorkspace[] = [];
    const gate = deferred();
    const session = new AnalysisSession(async (rootPath) => {
      if (created.length === 0) await gate.promise;
      const workspace = createFakeWorkspace(rootPath);
      created.push(workspace);
      return workspace;
    });

    const first = session.load("first");
    const second = session.load("second");
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(created).toEqual([]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(created.map((workspace) => path.basename(workspace.rootPath))).toEqual([
      "first",
      "second",
    ]);
    expect(created[0]?.disposed).toBe(true);
    expect(created[1]?.disposed).toBe(false);
    expect(session.rootPath).toBe(path.resolve("second"));
  });

  it("unloads and logs the lifecycle", async () => {
    const events: LogEventInput[] = [];
    const workspace = createFakeWorkspace(path.resolve("project"));
    const session = new AnalysisSession(async () => workspace, {
      log: (event) => events.push(event),
    });

    await session.load("project");
    await session.unload();

    expect(session.isLoaded).toBe(false);
    expect(workspace.disposed).toBe(true);
    expect(events.map((event) => event.type)).toEqual(["analysis.load", "analysis.unload"]);
    expect(events[1]?.payload).toEqual({ root_path: path.resolve("project") });
  });

  it("stays unloaded when the loader fails", async () => {
    const session = new AnalysisSession(async () => {
      throw new Error("compiler crashed");
    });

    await expect(session.load("project")).rejects.toThrow("compiler crashed");
    expect(session.isLoaded).toBe(false);
  });
});
