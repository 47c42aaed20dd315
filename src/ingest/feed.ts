/**
 * Part feed readers
 *
 * A feed is either a JSON array of records or JSON Lines (one record per line,
 * blank lines ignored).
 */

import { readFileSync } from 'node:fs';
import { IngestError, IngestErrorCode } from './types.js';

/**
 * Parse feed text into raw records
 */
export function parseFeed(text: string): unknown[] {
  const trimmed = text.trim();
  if (trimmed === '') return [];

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new IngestError(
        'Feed is not valid JSON',
        IngestErrorCode.FEED_UNREADABLE,
        error instanceof Error ? error : undefined
      );
    }
    if (!Array.isArray(parsed)) {
      throw new IngestError('Feed must be a JSON array of records', IngestErrorCode.FEED_UNREADABLE);
    }
    return parsed;
  }

  const records: unknown[] = [];
  const lines = trimmed.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    if (line === '') continue;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      throw new IngestError(
        `Feed line ${i + 1} is not valid JSON`,
        IngestErrorCode.FEED_UNREADABLE,
        error instanceof Error ? error : undefined
      );
    }
  }
  return records;
}

/**
 * Read a feed file from disk
 */
export function readFeedFile(path: string): unknown[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new IngestError(
      `Cannot read feed file: ${path}`,
      IngestErrorCode.FEED_MISSING,
      error instanceof Error ? error : undefined
    );
  }
  return parseFeed(text);
}
