import type { TerminalEvent } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import type { FoodLogController } from './controller.js';

export interface EventSource {
  next(): Promise<TerminalEvent>;
}

export type LoopExit = 'quit' | 'closed';

/**
 * Read one event at a time and hand it to the controller. Each handler
 * finishes, writes included, before the next event is awaited.
 */
export async function runEventLoop(
  source: EventSource,
  controller: FoodLogController,
  logger: Logger
): Promise<LoopExit> {
  for (;;) {
    const event = await source.next();

    switch (event.type) {
      case 'key':
        if (!controller.accepts(event.key)) {
          logger.debug('key ignored', { key: event.key.name });
          break;
        }
        if (controller.handleKey(event.key) === 'quit') return 'quit';
        break;
      case 'resize':
        logger.debug('resize', { columns: event.columns, rows: event.rows });
        controller.resize(event.columns, event.rows);
        break;
      case 'closed':
        return 'closed';
      // Focus, paste and mouse are observed but not handled yet
      case 'focus':
      case 'paste':
      case 'mouse':
        logger.debug('event ignored', { type: event.type });
        break;
    }
  }
}
