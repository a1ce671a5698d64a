import fs from "node:fs";
import path from "node:path";

import type { ConfigOverride, ResolvedConfig } from "@spendtop/shared";
import {
  configDefaults,
  configOverrideSchema,
  configSchema,
  isMissingFileError,
  resolveConfigDir,
  resolveConfigFilePath,
} from "@spendtop/shared";
import YAML from "yaml";
import type { ZodError } from "zod";

const DEFAULT_CONFIG_BASENAME = "config.yml";

export type ConfigIssue = {
  path: string;
  message: string;
};

export type LoadedConfig = {
  config: ResolvedConfig;
  configPath: string | null;
};

export type ConfigCheckResult = {
  ok: boolean;
  configPath: string | null;
  issues: ConfigIssue[];
};

export const getConfigDir = () => resolveConfigDir();

export const getDefaultConfigPath = () => path.join(getConfigDir(), DEFAULT_CONFIG_BASENAME);

/**
 * The explicit `--config` path when given, otherwise the first config file
 * found in the config directory.
 */
export const resolveConfigPath = (explicitPath?: string | null) => {
  if (explicitPath) {
    return path.resolve(explicitPath);
  }
  return resolveConfigFilePath({
    configDir: getConfigDir(),
    readErrorPrefix: "failed to read config",
  });
};

const toIssues = (error: ZodError): ConfigIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));

const readConfigText = (configPath: string) => {
  try {
    return fs.readFileSync(configPath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`config not found: ${configPath}`);
    }
    throw new Error(`failed to read config: ${configPath}`);
  }
};

const parseConfigText = (raw: string, configPath: string): unknown => {
  if (path.extname(configPath) === ".json") {
    try {
      return JSON.parse(raw);
    } catch {
      throw new Error(`invalid config JSON: ${configPath}`);
    }
  }
  try {
    // An empty document parses to null and means "no overrides".
    return YAML.parse(raw) ?? {};
  } catch {
    throw new Error(`invalid config YAML: ${configPath}`);
  }
};

export const loadConfigOverride = (configPath: string): ConfigOverride => {
  const parsed = configOverrideSchema.safeParse(
    parseConfigText(readConfigText(configPath), configPath),
  );
  if (!parsed.success) {
    const issue = toIssues(parsed.error)[0];
    const pathLabel = issue?.path ?? "unknown";
    const detail = issue?.message ?? "validation failed";
    throw new Error(`invalid config: ${configPath} ${pathLabel} ${detail}`);
  }
  return parsed.data;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (value == null || typeof value !== "object") {
    return false;
  }
  return Object.getPrototypeOf(value) === Object.prototype;
};

const deepMerge = (baseValue: unknown, overrideValue: unknown): unknown => {
  if (typeof overrideValue === "undefined") {
    return baseValue;
  }
  if (Array.isArray(overrideValue)) {
    return [...overrideValue];
  }
  if (isPlainObject(baseValue) && isPlainObject(overrideValue)) {
    const merged: Record<string, unknown> = { ...baseValue };
    Object.keys(overrideValue).forEach((key) => {
      merged[key] = deepMerge(baseValue[key], overrideValue[key]);
    });
    return merged;
  }
  return overrideValue;
};

export const mergeConfig = (
  base: ResolvedConfig,
  override: ConfigOverride | null,
): ResolvedConfig => {
  const parsed = configSchema.safeParse(override == null ? base : deepMerge(base, override));
  if (!parsed.success) {
    const issue = toIssues(parsed.error)[0];
    const pathLabel = issue?.path ?? "unknown";
    const detail = issue?.message ?? "validation failed";
    throw new Error(`invalid config: ${pathLabel} ${detail}`);
  }
  return parsed.data;
};

export const loadConfig = ({ configPath }: { configPath?: string | null } = {}): LoadedConfig => {
  const resolvedPath = resolveConfigPath(configPath);
  const override = resolvedPath ? loadConfigOverride(resolvedPath) : null;
  return { config: mergeConfig(configDefaults, override), configPath: resolvedPath };
};

/**
 * Writes the defaults as YAML unless a config file already exists.
 */
export const initConfig = ({ configPath }: { configPath?: string | null } = {}) => {
  const existing = resolveConfigPath(configPath);
  if (existing && fs.existsSync(existing)) {
    return { created: false, configPath: existing };
  }
  const targetPath = existing ?? getDefaultConfigPath();
  fs.mkdirSync(path.dirname(targetPath), { recursive: true, mode: 0o700 });
  fs.writeFileSync(targetPath, YAML.stringify(configDefaults), { encoding: "utf8", mode: 0o600 });
  return { created: true, configPath: targetPath };
};

/**
 * Validates the config file and reports every issue instead of the first.
 * A missing file is reported with a null path.
 */
export const runConfigCheck = ({
  configPath,
}: { configPath?: string | null } = {}): ConfigCheckResult => {
  const resolvedPath = resolveConfigPath(configPath);
  if (!resolvedPath || !fs.existsSync(resolvedPath)) {
    return { ok: false, configPath: null, issues: [] };
  }
  const override = configOverrideSchema.safeParse(
    parseConfigText(readConfigText(resolvedPath), resolvedPath),
  );
  if (!override.success) {
    return { ok: false, configPath: resolvedPath, issues: toIssues(override.error) };
  }
  const merged = configSchema.safeParse(deepMerge(configDefaults, override.data));
  if (!merged.success) {
    return { ok: false, configPath: resolvedPath, issues: toIssues(merged.error) };
  }
  return { ok: true, configPath: resolvedPath, issues: [] };
};
