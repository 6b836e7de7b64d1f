/**
 * Application wiring
 *
 * Startup order matters:
 *   1. Load the catalog. A missing file throws here, before anything is
 *      drawn, so the error lands on a normal terminal.
 *   2. Save the cursor, draw the overview, then enter raw mode.
 *   3. Run the loop. The terminal is restored in `finally`, whether the
 *      loop ended by quit, closed input, a signal, or an exception.
 */

import { resolve } from 'path';
import { loadCatalog } from './catalog/loader.js';
import { MacroAccumulator } from './macros/accumulator.js';
import type { Logger } from './shared/logger.js';
import type { AppConfig, MacroTotals } from './shared/types.js';
import { Canvas, type TerminalOutput } from './terminal/canvas.js';
import {
  TerminalEventSource,
  outputSize,
  type InputStream,
  type ResizableOutput,
} from './terminal/events.js';
import { TerminalSession, type RawModeInput } from './terminal/session.js';
import { FoodLogController } from './tui/controller.js';
import { runEventLoop, type LoopExit } from './tui/loop.js';

export interface AppOptions {
  config: AppConfig;
  logger: Logger;
  /** Keystrokes come from here (stdin) */
  input: InputStream & RawModeInput;
  /** Size and resize notifications come from here (stdout) */
  screen: ResizableOutput;
  /** Drawing goes here */
  output: TerminalOutput;
  /** Base for a relative catalog path (default: process.cwd()) */
  cwd?: string;
  /** Aborting ends the loop and restores the terminal */
  signal?: AbortSignal;
}

export interface AppResult {
  exit: LoopExit;
  totals: Readonly<MacroTotals>;
}

export async function runApp(options: AppOptions): Promise<AppResult> {
  const { config, logger } = options;
  const catalogPath = resolve(options.cwd ?? process.cwd(), config.catalog.path);
  const catalog = loadCatalog(catalogPath, logger);

  const { columns, rows } = outputSize(options.screen);
  const canvas = new Canvas(options.output, columns, rows);
  const accumulator = new MacroAccumulator();
  const controller = new FoodLogController(canvas, catalog.records, accumulator, {
    retainInput: config.form.retainInput,
    logger,
  });
  const session = new TerminalSession(options.input, options.output, {
    alternateScreen: config.terminal.alternateScreen,
  });

  session.begin();
  const events = new TerminalEventSource(options.input, options.screen, options.signal);
  try {
    controller.renderOverview();
    session.enableRawMode();
    logger.info('session started', { columns, rows });

    const exit = await runEventLoop(events, controller, logger);
    logger.info('session ended', { exit, ...accumulator.totals });
    return { exit, totals: accumulator.totals };
  } finally {
    events.close();
    session.end();
  }
}
