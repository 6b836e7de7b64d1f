/**
 * ANSI escape helpers.
 *
 * Styles wrap a string and reset after it. Control sequences are plain
 * constants or small builders; coordinates are 0-based here and converted
 * to the terminal's 1-based addressing in `cursorTo`.
 */

export const ESC = '\x1b';
const CSI = `${ESC}[`;
const RESET = `${CSI}0m`;

// Styles
export const bold = (s: string): string => `${CSI}1m${s}${RESET}`;
export const dim = (s: string): string => `${CSI}2m${s}${RESET}`;
export const cyan = (s: string): string => `${CSI}36m${s}${RESET}`;

// Cursor and screen control
export const cursorTo = (x: number, y: number): string => `${CSI}${y + 1};${x + 1}H`;
export const CLEAR_SCREEN = `${CSI}2J`;
export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;
export const SAVE_CURSOR = `${ESC}7`;
export const RESTORE_CURSOR = `${ESC}8`;
export const ENTER_ALT_SCREEN = `${CSI}?1049h`;
export const LEAVE_ALT_SCREEN = `${CSI}?1049l`;

const SGR_PATTERN = new RegExp(`${ESC}\\[[0-9;]*m`, 'g');

export function stripAnsi(s: string): string {
  return s.replace(SGR_PATTERN, '');
}

/**
 * Number of characters (code points) a string puts on screen, ignoring
 * styling. This is what cursor bookkeeping counts, never bytes.
 */
export function charCount(s: string): number {
  return [...stripAnsi(s)].length;
}
