import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ConductorConfigSchema, defaultConductorConfig, type ConductorConfig } from "./config.js";
import { resolveConfigPath, type ConfigSource } from "./config-discovery.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT =
  "Create .git-conductor/config.yaml in the repository or pass --config <path>.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun. Every key is optional.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!isRecord(error)) {
    return null;
  }

  const mark = error.mark;
  if (!isRecord(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadedConfig = {
  config: ConductorConfig;
  configPath: string | null;
  source: ConfigSource;
};

export function loadConductorConfig(configPath: string): ConductorConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    // An empty file means "all defaults".
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = ConductorConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    return {
      ...cfg,
      backups: { ...cfg.backups, dir: path.resolve(configDir, cfg.backups.dir) },
      log_file: cfg.log_file ? path.resolve(configDir, cfg.log_file) : undefined,
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function loadConfigForCli(args: { explicitPath?: string; cwd?: string }): LoadedConfig {
  const resolution = resolveConfigPath(args);
  if (resolution.source === "defaults") {
    return { config: defaultConductorConfig(), configPath: null, source: "defaults" };
  }

  return {
    config: loadConductorConfig(resolution.configPath),
    configPath: resolution.configPath,
    source: resolution.source,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
