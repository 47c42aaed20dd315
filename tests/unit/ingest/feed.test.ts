import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseFeed, readFeedFile } from '../../../src/ingest/feed.js';
import { IngestError, IngestErrorCode } from '../../../src/ingest/types.js';

function codeOf(fn: () => unknown): IngestErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof IngestError) return error.code;
    throw error;
  }
  return undefined;
}

describe('Part feeds', () => {
  describe('parseFeed', () => {
    it('should read a JSON array', () => {
      expect(parseFeed(' [{"id":"a"},{"id":"b"}] ')).toEqual([{ id: 'a' }, { id: 'b' }]);
    });

    it('should read JSON Lines and skip blank lines', () => {
      expect(parseFeed('{"id":"a"}\r\n\n  {"id":"b"}\n')).toEqual([{ id: 'a' }, { id: 'b' }]);
    });

    it('should treat an empty feed as no records', () => {
      expect(parseFeed('  \n ')).toEqual([]);
    });

    it('should name the first unreadable line', () => {
      expect(() => parseFeed('{"id":"a"}\n\n{oops}')).toThrow('Feed line 3 is not valid JSON');
    });

    it('should reject a malformed array', () => {
      expect(codeOf(() => parseFeed('[{"id":"a"},'))).toBe(IngestErrorCode.FEED_UNREADABLE);
    });
  });

  describe('readFeedFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'partlens-feed-test-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should parse a feed file', () => {
      const path = join(tempDir, 'parts.jsonl');
      writeFileSync(path, '{"id":"a"}\n{"id":"b"}\n');

      expect(readFeedFile(path)).toHaveLength(2);
    });

    it('should report a missing file', () => {
      expect(codeOf(() => readFeedFile(join(tempDir, 'absent.json')))).toBe(IngestErrorCode.FEED_MISSING);
    });
  });
});
