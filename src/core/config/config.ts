// src/core/config/config.ts
// Configuration for the stackforth machine: size guards on stack, expansion and output

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type LimitsConfig = {
  /** Maximum number of values on the stack */
  maxStackDepth: number;
  /** Maximum number of tokens a single line may expand to */
  maxDefinitionTokens: number;
  /** Maximum length of the text one line may print */
  maxOutputLength: number;
};

export type MachineConfig = {
  limits: LimitsConfig;
};

// =========================================================================
// Default Configuration
// =========================================================================

/**
 * Hard cap on printed text per line, kept under V8's maximum string length
 * with room for one more fragment.
 */
export const OUTPUT_LENGTH_CEILING = 2 ** 29 - 64;

export const DEFAULT_LIMITS_CONFIG: LimitsConfig = {
  maxStackDepth: 1_000_000,
  maxDefinitionTokens: 1_000_000,
  maxOutputLength: 1 << 28,
};

export const DEFAULT_CONFIG: MachineConfig = {
  limits: DEFAULT_LIMITS_CONFIG,
};

// =========================================================================
// Configuration Loading
// =========================================================================

const isPositiveInt = (n: number) => Number.isInteger(n) && n > 0;

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw || !/^\d+$/.test(raw.trim())) return undefined;
  const n = Number(raw.trim());
  return isPositiveInt(n) ? n : undefined;
}

function intField(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const v = data[key];
    if (typeof v === "number" && isPositiveInt(v)) return v;
  }
  return undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "STACKFORTH"): MachineConfig {
  return {
    limits: {
      maxStackDepth: intFromEnv(`${prefix}_MAX_STACK_DEPTH`) ?? DEFAULT_LIMITS_CONFIG.maxStackDepth,
      maxDefinitionTokens: intFromEnv(`${prefix}_MAX_DEFINITION_TOKENS`) ?? DEFAULT_LIMITS_CONFIG.maxDefinitionTokens,
      maxOutputLength: intFromEnv(`${prefix}_MAX_OUTPUT_LENGTH`) ?? DEFAULT_LIMITS_CONFIG.maxOutputLength,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): MachineConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must hold a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): MachineConfig {
  const limits: Record<string, unknown> = isRecord(data.limits) ? data.limits : {};

  return {
    limits: {
      maxStackDepth:
        intField(limits, "maxStackDepth", "max_stack_depth") ?? DEFAULT_LIMITS_CONFIG.maxStackDepth,
      maxDefinitionTokens:
        intField(limits, "maxDefinitionTokens", "max_definition_tokens") ?? DEFAULT_LIMITS_CONFIG.maxDefinitionTokens,
      maxOutputLength:
        intField(limits, "maxOutputLength", "max_output_length") ?? DEFAULT_LIMITS_CONFIG.maxOutputLength,
    },
  };
}

export type PartialConfig = {
  limits?: Partial<LimitsConfig>;
};

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): MachineConfig {
  const result: MachineConfig = { limits: { ...DEFAULT_CONFIG.limits } };

  for (const cfg of configs) {
    if (cfg.limits) {
      result.limits = { ...result.limits, ...cfg.limits };
    }
  }

  return result;
}

/**
 * Load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
}): MachineConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else if (fs.existsSync("stackforth.config.json")) {
    config = mergeConfigs(config, configFromFile("stackforth.config.json"));
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: MachineConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [key, value] of Object.entries(config.limits)) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${key} must be a positive integer`);
    }
  }

  if (config.limits.maxOutputLength > OUTPUT_LENGTH_CEILING) {
    errors.push(`maxOutputLength must not exceed ${OUTPUT_LENGTH_CEILING}`);
  }

  if (config.limits.maxStackDepth < 3) {
    warnings.push("maxStackDepth is below 3, rot can never succeed");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
