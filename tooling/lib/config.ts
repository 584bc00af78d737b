/**
 * Configuration loading, environment overrides and path expansion
 */

import { config as loadEnv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { DEFAULT_TRIAL_COUNT } from "./harness";
import { LogLevel } from "./logger";
import { Config, TrialOptions } from "./types";
import { isPlainObject } from "./utils";

export const CONFIG_FILE_NAME = "proptype.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_CATALOG_PATH = "generated/proptype-catalog.json";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isInteger(value) ? value : undefined;
}

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

/**
 * Keep only the recognised, well-typed keys of a parsed config file.
 */
function sanitize(parsed: unknown): Config {
  if (!isPlainObject(parsed)) {
    return {};
  }
  const config: Config = {};
  if (Array.isArray(parsed.envSearchPaths)) {
    config.envSearchPaths = parsed.envSearchPaths.filter((entry): entry is string => typeof entry === "string");
  }
  if (typeof parsed.trialCount === "number" && Number.isInteger(parsed.trialCount) && parsed.trialCount > 0) {
    config.trialCount = parsed.trialCount;
  }
  if (typeof parsed.verboseTrace === "boolean") config.verboseTrace = parsed.verboseTrace;
  if (typeof parsed.seed === "number" && Number.isInteger(parsed.seed)) config.seed = parsed.seed;
  if (isLogLevel(parsed.logLevel)) config.logLevel = parsed.logLevel;
  if (typeof parsed.catalogPath === "string") config.catalogPath = parsed.catalogPath;
  return config;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string = join(projectRoot, CONFIG_FILE_NAME)) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    try {
      return sanitize(JSON.parse(readFileSync(configPath, "utf8")));
    } catch {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing `.env` file on the search path. Variables already
   * set in the process win.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      loadEnv({ path: expanded, override: false });
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getTrialCount(): number {
    const fromEnv = parseInteger(process.env.PROPTYPE_TRIAL_COUNT);
    if (fromEnv !== undefined && fromEnv > 0) {
      return fromEnv;
    }
    return this.config.trialCount ?? DEFAULT_TRIAL_COUNT;
  }

  getVerboseTrace(): boolean {
    return parseFlag(process.env.PROPTYPE_VERBOSE) ?? this.config.verboseTrace ?? false;
  }

  getSeed(): number | undefined {
    return parseInteger(process.env.PROPTYPE_SEED) ?? this.config.seed;
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getCatalogPath(): string {
    return this.expandPath(this.config.catalogPath ?? DEFAULT_CATALOG_PATH);
  }

  /**
   * Harness options built from the file and environment.
   */
  trialOptions(): TrialOptions {
    const options: TrialOptions = {
      trialCount: this.getTrialCount(),
      verboseTrace: this.getVerboseTrace(),
    };
    const seed = this.getSeed();
    if (seed !== undefined) {
      options.seed = seed;
    }
    return options;
  }

  getConfig(): Config {
    return this.config;
  }
}
