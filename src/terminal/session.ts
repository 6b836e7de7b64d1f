/**
 * Terminal session
 *
 * Raw mode is process-wide state. The session acquires it once, after the
 * first screen is drawn, and `end()` puts the terminal back the way it was:
 * raw mode off, screen cleared, saved cursor restored and visible.
 */

import type { TerminalOutput } from './canvas.js';
import {
  CLEAR_SCREEN,
  ENTER_ALT_SCREEN,
  LEAVE_ALT_SCREEN,
  RESTORE_CURSOR,
  SAVE_CURSOR,
  SHOW_CURSOR,
} from './ansi.js';

/** The raw-mode half of a TTY input stream. */
export interface RawModeInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface SessionOptions {
  alternateScreen: boolean;
}

export class TerminalSession {
  private raw = false;
  private started = false;

  constructor(
    private readonly input: RawModeInput,
    private readonly output: TerminalOutput,
    private readonly options: SessionOptions
  ) {}

  get isRaw(): boolean {
    return this.raw;
  }

  /** Save the cursor and switch screens before the first draw. */
  begin(): void {
    this.started = true;
    this.output.write(SAVE_CURSOR + (this.options.alternateScreen ? ENTER_ALT_SCREEN : ''));
  }

  /** No-op when stdin is not a TTY (piped input). */
  enableRawMode(): void {
    if (this.raw || !this.input.isTTY || !this.input.setRawMode) return;
    this.input.setRawMode(true);
    this.raw = true;
  }

  /** Undo everything `begin` and `enableRawMode` did. Safe to call twice. */
  end(): void {
    if (this.raw && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.raw = false;

    if (!this.started) return;
    this.started = false;
    this.output.write(
      CLEAR_SCREEN +
        (this.options.alternateScreen ? LEAVE_ALT_SCREEN : '') +
        RESTORE_CURSOR +
        SHOW_CURSOR
    );
  }
}
