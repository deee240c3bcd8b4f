/*
Purpose: explicit handle for a loaded code-analysis workspace (symbols, references, dependency graph).
Assumptions: the analysis itself is supplied by the loader; this class only owns the lifecycle.
Usage: const session = new AnalysisSession(loader); await session.load(repoPath); await session.findSymbols("main");
*/

import path from "node:path";

import pLimit, { type LimitFunction } from "p-limit";

import { PreconditionError } from "../core/errors.js";
import { noopLogger, type EventLogger } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type SymbolLocation = {
  name: string;
  kind: string;
  filePath: string;
  line: number;
  column: number;
};

export type ReferenceLocation = {
  filePath: string;
  line: number;
  column: number;
  text: string;
};

export type DependencyEdge = {
  from: string;
  to: string;
};

export interface AnalysisWorkspace {
  findSymbols(name: string): Promise<SymbolLocation[]>;
  findReferences(name: string): Promise<ReferenceLocation[]>;
  getDependencies(): Promise<DependencyEdge[]>;
  dispose(): Promise<void>;
}

export type WorkspaceLoader = (rootPath: string) => Promise<AnalysisWorkspace>;

type LoadedWorkspace = {
  rootPath: string;
  workspace: AnalysisWorkspace;
};

// =============================================================================
// SESSION
// =============================================================================

export class AnalysisSession {
  // Loads and unloads never overlap; queries are not queued behind them.
  private readonly lifecycle: LimitFunction = pLimit(1);
  private current: LoadedWorkspace | null = null;

  constructor(
    private readonly loader: WorkspaceLoader,
    private readonly logger: EventLogger = noopLogger,
  ) {}

  get isLoaded(): boolean {
    return this.current !== null;
  }

  get rootPath(): string | null {
    return this.current?.rootPath ?? null;
  }

  load(rootPath: string): Promise<void> {
    return this.lifecycle(async () => {
      const resolved = path.resolve(rootPath);
      await this.disposeCurrent();

      const startedAt = Date.now();
      const workspace = await this.loader(resolved);
      this.current = { rootPath: resolved, workspace };

      this.logger.log({
        type: "analysis.load",
        payload: { root_path: resolved, duration_ms: Date.now() - startedAt },
      });
    });
  }

  unload(): Promise<void> {
    return this.lifecycle(() => this.disposeCurrent());
  }

  async findSymbols(name: string): Promise<SymbolLocation[]> {
    return this.requireWorkspace().findSymbols(name);
  }

  async findReferences(name: string): Promise<ReferenceLocation[]> {
    return this.requireWorkspace().findReferences(name);
  }

  async getDependencies(): Promise<DependencyEdge[]> {
    return this.requireWorkspace().getDependencies();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private requireWorkspace(): AnalysisWorkspace {
    if (!this.current) {
      throw new PreconditionError("No analysis workspace is loaded; call load() first");
    }
    return this.current.workspace;
  }

  private async disposeCurrent(): Promise<void> {
    const previous = this.current;
    if (!previous) return;

    this.current = null;
    await previous.workspace.dispose();
    this.logger.log({ type: "analysis.unload", payload: { root_path: previous.rootPath } });
  }
}
