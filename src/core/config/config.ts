// src/core/config/config.ts
// Configuration system for the reload engine

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReloadingConfig = {
  /** Reload the fragment every n-th iteration/invocation */
  every: number;
  /** Consecutive failing attempts of one function call before the error propagates */
  maxAttempts: number;
  /** Name of the entry point call that marks a fragment in source */
  marker: string;
  /** Emit trace events to the console */
  trace: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: ReloadingConfig = {
  every: 1,
  maxAttempts: 3,
  marker: "reloading",
  trace: false,
};

export const DEFAULT_CONFIG_FILES = ["reloading.config.json", ".reloadingrc.json"];

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return !["0", "false", "no", "off"].includes(value.toLowerCase());
}

/**
 * Load configuration from environment variables.
 * Unset variables are left out so they do not override other layers.
 */
export function configFromEnv(prefix = "RELOADING", env: NodeJS.ProcessEnv = process.env): Partial<ReloadingConfig> {
  const config: Partial<ReloadingConfig> = {};

  const every = envInt(env[`${prefix}_EVERY`]);
  if (every !== undefined) config.every = every;

  const maxAttempts = envInt(env[`${prefix}_MAX_ATTEMPTS`]);
  if (maxAttempts !== undefined) config.maxAttempts = maxAttempts;

  const marker = env[`${prefix}_MARKER`];
  if (marker) config.marker = marker;

  const trace = envBool(env[`${prefix}_TRACE`]);
  if (trace !== undefined) config.trace = trace;

  return config;
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys; values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): Partial<ReloadingConfig> {
  const config: Partial<ReloadingConfig> = {};

  const every = data.every;
  if (typeof every === "number") config.every = every;

  const maxAttempts = data.maxAttempts ?? data.max_attempts;
  if (typeof maxAttempts === "number") config.maxAttempts = maxAttempts;

  const marker = data.marker;
  if (typeof marker === "string") config.marker = marker;

  const trace = data.trace;
  if (typeof trace === "boolean") config.trace = trace;

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): Partial<ReloadingConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }

  return configFromObject(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<ReloadingConfig>[]): ReloadingConfig {
  let result: ReloadingConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    result = { ...result, ...stripUndefined(cfg) };
  }

  return result;
}

function stripUndefined(cfg: Partial<ReloadingConfig>): Partial<ReloadingConfig> {
  const out: Partial<ReloadingConfig> = {};
  if (cfg.every !== undefined) out.every = cfg.every;
  if (cfg.maxAttempts !== undefined) out.maxAttempts = cfg.maxAttempts;
  if (cfg.marker !== undefined) out.marker = cfg.marker;
  if (cfg.trace !== undefined) out.trace = cfg.trace;
  return out;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ReloadingConfig>;
}): ReloadingConfig {
  const layers: Partial<ReloadingConfig>[] = [configFromEnv("RELOADING", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ReloadingConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.every) || config.every < 1) {
    errors.push("every must be a positive integer");
  }
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    errors.push("maxAttempts must be a positive integer");
  }
  if (!IDENTIFIER.test(config.marker)) {
    errors.push(`marker must be an identifier, got "${config.marker}"`);
  }
  if (config.every > 1000) {
    warnings.push("every is very high, edits may take a long time to show up");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
