import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_BACKUP_DIR } from "./config.js";
import { loadConductorConfig, loadConfigForCli } from "./config-loader.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const tempDirs: string[] = [];

function makeDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "conductor-config-"));
  tempDirs.push(dir);
  return dir;
}

function writeConfig(dir: string, contents: string): string {
  const configPath = path.join(dir, ".git-conductor", "config.yaml");
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.GC_TEST_REMOTE;
});

describe("loadConductorConfig", () => {
  it("fills defaults for an empty file", () => {
    const configPath = writeConfig(makeDir(), "");

    const config = loadConductorConfig(configPath);

    expect(config).toEqual({
      git_binary: "git",
      default_remote: "origin",
      command_timeout_ms: 300_000,
      serialize_repo_operations: true,
      diff_max_chars: 10_000,
      conflict_preview_chars: 5_000,
      backups: { enabled: true, dir: DEFAULT_BACKUP_DIR },
      log_file: undefined,
    });
  });

  it("resolves relative paths against the config directory", () => {
    const dir = makeDir();
    const configPath = writeConfig(
      dir,
      ["log_file: logs/events.jsonl", "backups:", "  dir: backups"].join("\n"),
    );

    const config = loadConductorConfig(configPath);

    expect(config.log_file).toBe(path.join(dir, ".git-conductor", "logs", "events.jsonl"));
    expect(config.backups).toEqual({
      enabled: true,
      dir: path.join(dir, ".git-conductor", "backups"),
    });
  });

  it("expands environment variables", () => {
    process.env.GC_TEST_REMOTE = "upstream";
    const configPath = writeConfig(makeDir(), "default_remote: ${GC_TEST_REMOTE}\n");

    expect(loadConductorConfig(configPath).default_remote).toBe("upstream");
  });

  it("reports unset environment variables with their location", () => {
    const configPath = writeConfig(makeDir(), "default_remote: ${GC_TEST_REMOTE}\n");

    const error = captureError(() => loadConductorConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.title).toBe("Config invalid.");
    expect(userError.cause).toBeInstanceOf(ConfigError);
    expect((userError.cause as ConfigError).message).toBe(
      `Environment variable GC_TEST_REMOTE is not set but is referenced in ${configPath} (default_remote).`,
    );
  });

  it("formats schema issues", () => {
    const configPath = writeConfig(makeDir(), "diff_max_chars: lots\ncolour: red\n");

    const error = captureError(() => loadConductorConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    const cause = (error as UserFacingError).cause;
    expect(cause).toBeInstanceOf(ConfigError);
    const message = (cause as ConfigError).message;
    expect(message).toContain("diff_max_chars: Expected number, received string");
    expect(message).toContain("<root>: Unrecognized keys: colour");
  });

  it("rejects a missing file with a hint", () => {
    const missing = path.join(makeDir(), "nope.yaml");

    const error = captureError(() => loadConductorConfig(missing));

    expect(error).toBeInstanceOf(UserFacingError);
    expect((error as UserFacingError).code).toBe(USER_FACING_ERROR_CODES.config);
    expect((error as UserFacingError).message).toBe(`Config not found at ${missing}.`);
  });
});

describe("loadConfigForCli", () => {
  it("discovers the repo config from a nested directory", () => {
    const repo = makeDir();
    fs.mkdirSync(path.join(repo, ".git"));
    writeConfig(repo, "default_remote: mirror\n");
    const nested = path.join(repo, "src", "deep");
    fs.mkdirSync(nested, { recursive: true });

    const loaded = loadConfigForCli({ cwd: nested });

    expect(loaded.source).toBe("repo");
    expect(loaded.configPath).toBe(path.join(repo, ".git-conductor", "config.yaml"));
    expect(loaded.config.default_remote).toBe("mirror");
  });

  it("falls back to defaults inside a repo without a config", () => {
    const repo = makeDir();
    fs.mkdirSync(path.join(repo, ".git"));

    const loaded = loadConfigForCli({ cwd: repo });

    expect(loaded.source).toBe("defaults");
    expect(loaded.configPath).toBeNull();
    expect(loaded.config.default_remote).toBe("origin");
  });

  it("prefers an explicit path", () => {
    const dir = makeDir();
    const explicit = path.join(dir, "custom.yaml");
    fs.writeFileSync(explicit, "command_timeout_ms: 0\n", "utf8");

    const loaded = loadConfigForCli({ explicitPath: explicit, cwd: dir });

    expect(loaded.source).toBe("explicit");
    expect(loaded.config.command_timeout_ms).toBe(0);
  });
});
