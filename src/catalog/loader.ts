/**
 * Food Catalog Loader
 *
 * The catalog is a plain text file, one food per line, six tab-separated
 * fields:
 *
 *   # name	calories	carbs	fat	protein	unit
 *   Egg	70	1	5	6	each
 *
 * Lines starting with `#` are comments. A malformed line is dropped and
 * the rest of the file still loads; only an unreadable file is fatal.
 */

import { readFileSync } from 'fs';
import type { FoodRecord, ParseResult, RejectedLine } from '../shared/types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { parseFoodRecord } from './record.js';

const FIELD_COUNT = 6;

export class CatalogReadError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot read food catalog ${path}${reason}`, options);
    this.name = 'CatalogReadError';
  }
}

export interface Catalog {
  records: FoodRecord[];
  rejected: RejectedLine[];
}

export function isComment(line: string): boolean {
  return line.startsWith('#');
}

/**
 * Parse a single catalog line (no line terminator).
 */
export function parseCatalogLine(line: string): ParseResult<FoodRecord> {
  const fields = line.split('\t');
  if (fields.length !== FIELD_COUNT) {
    return {
      success: false,
      error: `expected ${FIELD_COUNT} tab-separated fields, got ${fields.length}`,
    };
  }

  const [name, calories, carbs, fat, protein, unit] = fields;
  return parseFoodRecord({ name, calories, carbs, fat, protein, unit });
}

/**
 * Parse catalog text. Records keep file order; rejections keep their
 * 1-based line number and the reason.
 */
export function parseCatalog(text: string): Catalog {
  const records: FoodRecord[] = [];
  const rejected: RejectedLine[] = [];

  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.length === 0 || isComment(line)) return;

    const result = parseCatalogLine(line);
    if (result.success) {
      records.push(result.value);
    } else {
      rejected.push({ line: index + 1, reason: result.error });
    }
  });

  return { records, rejected };
}

/**
 * Read and parse the catalog file.
 * @throws CatalogReadError when the file cannot be read
 */
export function loadCatalog(path: string, logger: Logger = silentLogger): Catalog {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new CatalogReadError(path, { cause: err });
  }

  const catalog = parseCatalog(text);
  for (const { line, reason } of catalog.rejected) {
    logger.debug('catalog line dropped', { path, line, reason });
  }
  logger.info('catalog loaded', {
    path,
    records: catalog.records.length,
    rejected: catalog.rejected.length,
  });
  return catalog;
}
