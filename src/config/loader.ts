/**
 * Configuration Loader
 *
 * Loads and merges configuration from multiple sources with a clear precedence:
 *   defaults → user config → project config → env vars
 *
 * Every module reads from a single AppConfig object. The loader handles all
 * the merging so consumers never worry about where a value came from.
 *
 * Config files use JSONC (JSON with Comments):
 *
 *   // ~/.config/macro-tui/config.jsonc
 *   {
 *     // keep the catalog next to the dotfiles
 *     "catalog": { "path": "/home/me/dotfiles/foods" },
 *     "logging": { "level": "debug", "file": "/tmp/macro-tui.log" }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as jsonc from 'jsonc-parser';
import { z } from 'zod';
import type { AppConfig, LogLevel } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: AppConfig = {
  catalog: {
    path: 'foods',
  },
  form: {
    retainInput: false,
  },
  terminal: {
    alternateScreen: true,
  },
  logging: {
    level: 'info',
  },
};

// ---------------------------------------------------------------------------
// Override schema
// ---------------------------------------------------------------------------

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Shape of a config file. Every key is optional; unknown keys are stripped.
 */
export const ConfigOverridesSchema = z.object({
  catalog: z.object({ path: z.string().min(1) }).partial().optional(),
  form: z.object({ retainInput: z.boolean() }).partial().optional(),
  terminal: z.object({ alternateScreen: z.boolean() }).partial().optional(),
  logging: z
    .object({ level: z.enum(LOG_LEVELS), file: z.string().min(1) })
    .partial()
    .optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Get paths for user-level and project-level config files.
 *
 *   User:    ~/.config/macro-tui/config.jsonc
 *   Project: <cwd>/.macro-tui.jsonc
 *
 * XDG_CONFIG_HOME is respected if set.
 */
export function getConfigPaths(workingDirectory?: string): {
  user: string;
  project: string;
} {
  const userConfigDir =
    process.env.XDG_CONFIG_HOME ?? join(homedir(), '.config');

  return {
    user: join(userConfigDir, 'macro-tui', 'config.jsonc'),
    project: join(workingDirectory ?? process.cwd(), '.macro-tui.jsonc'),
  };
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

/**
 * Load, parse and validate a JSONC config file. Returns null if the file
 * doesn't exist, is empty, or doesn't match the schema.
 *
 * Syntax errors only warn: jsonc-parser recovers what it can, and the
 * recovered value still has to pass validation.
 */
export function loadJsoncFile(path: string): ConfigOverrides | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Warning: Could not read ${path}: ${message}`);
    return null;
  }

  const errors: jsonc.ParseError[] = [];
  const raw: unknown = jsonc.parse(content, errors, {
    allowTrailingComma: true,
    allowEmptyContent: true,
  });

  if (errors.length > 0) {
    console.warn(
      `Warning: Parse errors in ${path}:`,
      errors.map((e) => `${jsonc.printParseErrorCode(e.error)} at offset ${e.offset}`)
    );
  }

  if (raw === undefined) {
    return null;
  }

  const result = ConfigOverridesSchema.safeParse(raw);
  if (!result.success) {
    console.warn(
      `Warning: Ignoring ${path}:`,
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
    return null;
  }

  return result.data;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Apply overrides section by section. Keys the override leaves out keep the
 * base value, so each layer only specifies what it changes.
 *
 *   mergeConfig(DEFAULT_CONFIG, { logging: { level: 'debug' } })
 *   // logging.level is 'debug', catalog.path is still 'foods'
 */
export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    catalog: { ...base.catalog, ...overrides.catalog },
    form: { ...base.form, ...overrides.form },
    terminal: { ...base.terminal, ...overrides.terminal },
    logging: { ...base.logging, ...overrides.logging },
  };
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load config overrides from MACRO_TUI_* environment variables.
 * Highest precedence. Unrecognized values are ignored.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const config: ConfigOverrides = {};

  const catalog = env.MACRO_TUI_CATALOG;
  if (catalog) {
    config.catalog = { path: catalog };
  }

  const retainInput = parseBooleanEnv(env.MACRO_TUI_RETAIN_INPUT);
  if (retainInput !== undefined) {
    config.form = { retainInput };
  }

  const alternateScreen = parseBooleanEnv(env.MACRO_TUI_ALT_SCREEN);
  if (alternateScreen !== undefined) {
    config.terminal = { alternateScreen };
  }

  const level = env.MACRO_TUI_LOG_LEVEL;
  if (level !== undefined && isLogLevel(level)) {
    config.logging = { ...config.logging, level };
  }

  const file = env.MACRO_TUI_LOG_FILE;
  if (file) {
    config.logging = { ...config.logging, file };
  }

  return config;
}

// ---------------------------------------------------------------------------
// Main loader
// ---------------------------------------------------------------------------

/**
 * Load the fully merged configuration.
 *
 * Merge order (lowest to highest precedence):
 *   1. DEFAULT_CONFIG
 *   2. User config          — ~/.config/macro-tui/config.jsonc
 *   3. Project config       — .macro-tui.jsonc in the working directory
 *   4. Environment vars     — MACRO_TUI_* variables
 */
export function loadConfig(workingDirectory?: string): AppConfig {
  let config = DEFAULT_CONFIG;

  const paths = getConfigPaths(workingDirectory);

  const userConfig = loadJsoncFile(paths.user);
  if (userConfig) {
    config = mergeConfig(config, userConfig);
  }

  const projectConfig = loadJsoncFile(paths.project);
  if (projectConfig) {
    config = mergeConfig(config, projectConfig);
  }

  const envConfig = loadEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    config = mergeConfig(config, envConfig);
  }

  return config;
}
