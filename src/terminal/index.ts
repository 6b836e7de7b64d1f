/**
 * Terminal layer: escape helpers, the buffered canvas, input decoding,
 * the event queue and the raw-mode session.
 */

export { Canvas } from './canvas.js';
export type { TerminalOutput, Size, Point } from './canvas.js';
export { decodeInput, isPrintable } from './keys.js';
export { TerminalEventSource, outputSize, DEFAULT_COLUMNS, DEFAULT_ROWS } from './events.js';
export type { InputStream, ResizableOutput } from './events.js';
export { TerminalSession } from './session.js';
export type { RawModeInput, SessionOptions } from './session.js';
export { createFdOutput } from './output.js';
export { bold, dim, cyan, stripAnsi, charCount } from './ansi.js';
