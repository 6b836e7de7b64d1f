/**
 * Input decoding
 *
 * Turns what a raw-mode terminal sends on stdin into TerminalEvents. One
 * chunk may hold several keys (fast typing, an unbracketed paste) so
 * decoding walks the whole string.
 *
 * Recognized sequences:
 *   \t, ESC [ Z             Tab, Shift+Tab
 *   \r, \n                  Enter
 *   DEL, BS                 Backspace
 *   ESC alone               Escape
 *   ESC <char>              Alt+char
 *   ESC [ A..D, ESC O A..D  arrows
 *   ESC [ I, ESC [ O        focus gained / lost
 *   ESC [200~ … ESC [201~   bracketed paste
 *   ESC [ < b ; x ; y M|m   SGR mouse report
 */

import type { Key, TerminalEvent } from '../shared/types.js';

const ESC = '\x1b';
const PASTE_START = `${ESC}[200~`;
const PASTE_END = `${ESC}[201~`;

const ARROWS: Partial<Record<string, Key>> = {
  A: { name: 'up' },
  B: { name: 'down' },
  C: { name: 'right' },
  D: { name: 'left' },
};

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
// CSI: parameter bytes 0x30–0x3F, intermediates 0x20–0x2F, final 0x40–0x7E
const CSI_SEQUENCE = /^\x1b\[[\x30-\x3f]*[\x20-\x2f]*[\x40-\x7e]/;

const key = (k: Key): TerminalEvent => ({ type: 'key', key: k });

interface Decoded {
  event: TerminalEvent;
  /** Number of UTF-16 code units consumed */
  length: number;
}

function decodeEscape(input: string): Decoded {
  if (input.startsWith(PASTE_START)) {
    const end = input.indexOf(PASTE_END, PASTE_START.length);
    const stop = end === -1 ? input.length : end;
    return {
      event: { type: 'paste', text: input.slice(PASTE_START.length, stop) },
      length: end === -1 ? input.length : end + PASTE_END.length,
    };
  }

  const mouse = SGR_MOUSE.exec(input);
  if (mouse) {
    return {
      event: {
        type: 'mouse',
        action: mouse[4] === 'M' ? 'press' : 'release',
        button: Number(mouse[1]),
        x: Number(mouse[2]) - 1,
        y: Number(mouse[3]) - 1,
      },
      length: mouse[0].length,
    };
  }

  const csi = CSI_SEQUENCE.exec(input);
  if (csi) {
    const sequence = csi[0];
    if (sequence === `${ESC}[Z`) return { event: key({ name: 'backtab' }), length: 3 };
    if (sequence === `${ESC}[I`) return { event: { type: 'focus', focused: true }, length: 3 };
    if (sequence === `${ESC}[O`) return { event: { type: 'focus', focused: false }, length: 3 };
    const arrow = sequence.length === 3 ? ARROWS[sequence[2]] : undefined;
    if (arrow) return { event: key(arrow), length: 3 };
    return { event: key({ name: 'unknown', sequence }), length: sequence.length };
  }

  const next = input[1];
  if (next === undefined || next === ESC) {
    return { event: key({ name: 'escape' }), length: 1 };
  }

  // SS3: ESC O <final>, used for arrows in application cursor mode
  if (next === 'O' && input.length >= 3) {
    const arrow = ARROWS[input[2]];
    return {
      event: key(arrow ?? { name: 'unknown', sequence: input.slice(0, 3) }),
      length: 3,
    };
  }

  const [alt] = [...input.slice(1)];
  return { event: key({ name: 'char', char: alt, alt: true }), length: 1 + alt.length };
}

function decodeOne(input: string): Decoded {
  const first = input[0];

  if (first === ESC) return decodeEscape(input);
  if (first === '\t') return { event: key({ name: 'tab' }), length: 1 };
  if (first === '\r' || first === '\n') return { event: key({ name: 'enter' }), length: 1 };
  if (first === '\x7f' || first === '\b') return { event: key({ name: 'backspace' }), length: 1 };

  const code = first.charCodeAt(0);
  if (code < 0x20) {
    // Ctrl+A is 0x01, Ctrl+Z is 0x1a
    const letter = String.fromCharCode(code + 0x60);
    return { event: key({ name: 'ctrl', char: letter }), length: 1 };
  }

  const [char] = [...input];
  return { event: key({ name: 'char', char, alt: false }), length: char.length };
}

/**
 * Decode one chunk of terminal input into events, in order.
 */
export function decodeInput(chunk: string): TerminalEvent[] {
  const events: TerminalEvent[] = [];
  let rest = chunk;
  while (rest.length > 0) {
    const { event, length } = decodeOne(rest);
    events.push(event);
    rest = rest.slice(length);
  }
  return events;
}

/** A key that types text into a field: printable and not Alt-modified. */
export function isPrintable(k: Key): k is { name: 'char'; char: string; alt: false } {
  return k.name === 'char' && !k.alt;
}
