// src/core/config/config.ts
// Configuration system for rulevm: VM limits and logging.

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

// =========================================================================
// Configuration Types
// =========================================================================

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type VMConfig = {
  /** Maximum evaluation steps per host operation (0 = unlimited) */
  maxEvalSteps: number;
  /** Maximum nested function call depth */
  maxCallDepth: number;
};

export type LogConfig = {
  level: LogLevel;
};

export type RuleVMConfig = {
  vm: VMConfig;
  log: LogConfig;
};

export type PartialConfig = {
  vm?: Partial<VMConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_VM_CONFIG: VMConfig = {
  maxEvalSteps: 1_000_000,
  maxCallDepth: 512,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: RuleVMConfig = {
  vm: DEFAULT_VM_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["rulevm.config.json"];

// =========================================================================
// Schemas
// =========================================================================

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const configSchema = z
  .object({
    vm: z
      .object({
        maxEvalSteps: z.number().int().nonnegative(),
        maxCallDepth: z.number().int().positive(),
      })
      .partial()
      .strict()
      .optional(),
    log: z.object({ level: logLevelSchema }).partial().strict().optional(),
  })
  .strict();

// =========================================================================
// Configuration Loading
// =========================================================================

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "RULEVM"): PartialConfig {
  const vm: Partial<VMConfig> = {};
  const maxEvalSteps = envInt(`${prefix}_MAX_EVAL_STEPS`);
  const maxCallDepth = envInt(`${prefix}_MAX_CALL_DEPTH`);
  if (maxEvalSteps !== undefined) vm.maxEvalSteps = maxEvalSteps;
  if (maxCallDepth !== undefined) vm.maxCallDepth = maxCallDepth;

  const log: Partial<LogConfig> = {};
  const level = logLevelSchema.safeParse(process.env[`${prefix}_LOG_LEVEL`]);
  if (level.success) log.level = level.data;

  return { vm, log };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 */
export function configFromObject(data: unknown): PartialConfig {
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): RuleVMConfig {
  const result: RuleVMConfig = {
    vm: { ...DEFAULT_CONFIG.vm },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.vm) {
      result.vm = { ...result.vm, ...definedOnly(cfg.vm) };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...definedOnly(cfg.log) };
    }
  }

  return result;
}

function definedOnly<T extends object>(obj: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (isKeyOf(obj, key) && obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  envPrefix?: string;
}): RuleVMConfig {
  const layers: PartialConfig[] = [configFromEnv(options?.envPrefix)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
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

export function validateConfig(config: RuleVMConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.vm.maxEvalSteps) || config.vm.maxEvalSteps < 0) {
    errors.push("maxEvalSteps must be a non-negative integer");
  } else if (config.vm.maxEvalSteps === 0) {
    warnings.push("maxEvalSteps is 0: evaluation is unbounded");
  } else if (config.vm.maxEvalSteps < 100) {
    warnings.push("maxEvalSteps is very low, may cause premature termination");
  }

  if (!Number.isInteger(config.vm.maxCallDepth) || config.vm.maxCallDepth < 1) {
    errors.push("maxCallDepth must be at least 1");
  }

  if (!logLevelSchema.safeParse(config.log.level).success) {
    errors.push(`Unknown log level: ${String(config.log.level)}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
