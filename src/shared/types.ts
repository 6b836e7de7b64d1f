/**
 * Shared types for macro-tui
 *
 * Everything that crosses a module boundary lives here: food records and
 * totals, the parse result contract, terminal events, and the config shape.
 */

// ---------------------------------------------------------------------------
// Food data
// ---------------------------------------------------------------------------

/**
 * One catalog entry. Nutrients are per `unit` (e.g. "each", "100 g").
 * The name is a loose identity; two records may share it.
 */
export interface FoodRecord {
  readonly name: string;
  readonly calories: number;
  readonly carbs: number;
  readonly fat: number;
  readonly protein: number;
  readonly unit: string;
}

/** The four running nutrient totals for the session. */
export interface MacroTotals {
  calories: number;
  carbs: number;
  fat: number;
  protein: number;
}

/** A parsed form submission: which food, and how many units of it. */
export interface FoodQuantity {
  food: FoodRecord;
  quantity: number;
}

// ---------------------------------------------------------------------------
// Parse results
// ---------------------------------------------------------------------------

/**
 * Result of parsing untrusted text. Failures carry the reason so callers
 * can log or assert on it even when the UI stays silent.
 */
export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };

/** A catalog line that did not produce a record. */
export interface RejectedLine {
  /** 1-based line number in the source file */
  line: number;
  reason: string;
}

// ---------------------------------------------------------------------------
// Terminal events
// ---------------------------------------------------------------------------

/**
 * A decoded keystroke. Printable input arrives as `char`, one code point
 * per event.
 */
export type Key =
  | { name: 'char'; char: string; alt: boolean }
  | { name: 'ctrl'; char: string }
  | { name: 'tab' }
  | { name: 'backtab' }
  | { name: 'enter' }
  | { name: 'escape' }
  | { name: 'backspace' }
  | { name: 'up' }
  | { name: 'down' }
  | { name: 'left' }
  | { name: 'right' }
  | { name: 'unknown'; sequence: string };

export type MouseAction = 'press' | 'release';

export type TerminalEvent =
  | { type: 'key'; key: Key }
  | { type: 'resize'; columns: number; rows: number }
  | { type: 'focus'; focused: boolean }
  | { type: 'paste'; text: string }
  | { type: 'mouse'; action: MouseAction; button: number; x: number; y: number }
  | { type: 'closed' };

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Fully resolved configuration. Defaults live in config/loader.ts; files
 * and env vars only override what they mention.
 */
export interface AppConfig {
  catalog: {
    /** Catalog file, resolved against the working directory when relative */
    path: string;
  };
  form: {
    /** Keep typed text when leaving the form (default: false) */
    retainInput: boolean;
  };
  terminal: {
    /** Draw on the alternate screen so the shell scrollback is untouched */
    alternateScreen: boolean;
  };
  logging: {
    level: LogLevel;
    /** JSON Lines log file. Logging is off when unset. */
    file?: string;
  };
}
