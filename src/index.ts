/**
 * macro-tui: terminal food log with running macro totals.
 *
 * The executable lives in cli.ts; this module exposes the pieces for reuse
 * and testing.
 */

// App
export { runApp } from './app.js';
export type { AppOptions, AppResult } from './app.js';

// Config
export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  mergeConfig,
  DEFAULT_CONFIG,
} from './config/index.js';

// Catalog
export {
  loadCatalog,
  parseCatalog,
  parseCatalogLine,
  parseFoodRecord,
  parseQuantity,
  formatFoodRecord,
  CatalogReadError,
} from './catalog/index.js';
export type { Catalog } from './catalog/index.js';

// Macros
export { MacroAccumulator, emptyTotals, scaleRecord, formatTotals } from './macros/index.js';

// Terminal
export { Canvas, TerminalEventSource, TerminalSession, decodeInput } from './terminal/index.js';

// TUI
export { FoodLogController, FormBuffer, FORM_FIELDS, parseSubmission, runEventLoop } from './tui/index.js';

// Logging
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';

// Types
export type {
  AppConfig,
  FoodRecord,
  FoodQuantity,
  MacroTotals,
  ParseResult,
  RejectedLine,
  Key,
  TerminalEvent,
  LogLevel,
} from './shared/types.js';
