import path from "node:path";

import fse from "fs-extra";

import { isoNow } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type WriteResult = {
  path: string;
  backupPath?: string;
  lineCount: number;
};

// The only file-mutation capability the workflows consume (manual conflict resolution).
export interface ResolvedContentWriter {
  writeResolvedContent(filePath: string, content: string): Promise<WriteResult>;
}

export type BackupFileWriterOptions = {
  backupsEnabled: boolean;
  backupDir: string;
};

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class BackupFileWriter implements ResolvedContentWriter {
  constructor(private readonly options: BackupFileWriterOptions) {}

  async writeResolvedContent(filePath: string, content: string): Promise<WriteResult> {
    const absolutePath = path.resolve(filePath);
    const backupPath = await this.backup(absolutePath);

    await fse.ensureDir(path.dirname(absolutePath));
    await fse.writeFile(absolutePath, content, "utf8");

    const result: WriteResult = { path: absolutePath, lineCount: countLines(content) };
    if (backupPath) result.backupPath = backupPath;
    return result;
  }

  private async backup(absolutePath: string): Promise<string | null> {
    if (!this.options.backupsEnabled) return null;
    if (!(await fse.pathExists(absolutePath))) return null;

    const stamp = isoNow().replace(/[:.]/g, "-");
    const backupPath = path.join(
      this.options.backupDir,
      `${path.basename(absolutePath)}.${stamp}.bak`,
    );

    await fse.ensureDir(this.options.backupDir);
    await fse.copy(absolutePath, backupPath, { overwrite: true });
    return backupPath;
  }
}

function countLines(content: string): number {
  if (content.length === 0) return 0;
  return content.split(/\r?\n/).length;
}
