import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ZodError } from 'zod';
import { createConfig, deepMerge, loadConfig } from '../../../src/config/config.js';
import { DEFAULT_CONFIG, PartlensConfigSchema } from '../../../src/config/schema.js';

describe('Configuration', () => {
  describe('defaults', () => {
    it('should fill every section from an empty object', () => {
      const config = PartlensConfigSchema.parse({});

      expect(config.embedding.provider).toBe('hashing');
      expect(config.embedding.dimensions).toBe(256);
      expect(config.index.hnsw.m).toBe(16);
      expect(config.index.exactThreshold).toBe(1000);
      expect(config.cache.admissionThreshold).toBe(1);
      expect(config.cache.costBoundMs).toBe(250);
      expect(config.router.weights).toEqual({ load: 0.4, latency: 0.4, health: 0.2 });
      expect(config.router.minErrorSamples).toBe(5);
      expect(config.ranking.weights).toEqual({ similarity: 0.7, filterMatch: 0.2, usagePrior: 0.1 });
      expect(config.query.defaultTopK).toBe(10);
    });

    it('should expose the parsed defaults as DEFAULT_CONFIG', () => {
      expect(DEFAULT_CONFIG.router.degradeAfter).toBe(2);
      expect(DEFAULT_CONFIG.router.unhealthyAfter).toBe(3);
      expect(DEFAULT_CONFIG.router.recoveryStreak).toBe(3);
    });

    it('should reject out-of-range coefficients', () => {
      expect(() => createConfig({ router: { ewmaAlpha: 2 } })).toThrow(ZodError);
      expect(() => createConfig({ embedding: { dimensions: 4 } })).toThrow(ZodError);
    });
  });

  describe('deepMerge', () => {
    it('should merge nested objects and replace arrays', () => {
      const merged = deepMerge(
        { a: { b: 1, c: 2 }, list: [1, 2, 3] },
        { a: { c: 5 }, list: [9] }
      );

      expect(merged).toEqual({ a: { b: 1, c: 5 }, list: [9] });
    });

    it('should ignore undefined source values', () => {
      expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'partlens-config-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should apply environment overrides with typed values', () => {
      const config = loadConfig({
        skipFile: true,
        env: {
          PARTLENS_EMBEDDING_DIMENSIONS: '64',
          PARTLENS_CACHE_ENABLED: 'false',
          PARTLENS_LOG_LEVEL: 'debug',
        },
      });

      expect(config.embedding.dimensions).toBe(64);
      expect(config.cache.enabled).toBe(false);
      expect(config.logging.level).toBe('debug');
    });

    it('should let explicit overrides win over the environment', () => {
      const config = loadConfig({
        skipFile: true,
        env: { PARTLENS_QUERY_DEFAULT_TOP_K: '5' },
        overrides: { query: { defaultTopK: 7 } },
      });

      expect(config.query.defaultTopK).toBe(7);
    });

    it('should read an explicit config file and keep sibling defaults', () => {
      const configPath = join(tempDir, 'custom.json');
      writeFileSync(configPath, JSON.stringify({ index: { exactThreshold: 10 } }));

      const config = loadConfig({ configPath, skipEnv: true });

      expect(config.index.exactThreshold).toBe(10);
      expect(config.index.hnsw.m).toBe(16);
    });

    it('should find partlens.config.json in the search directory', () => {
      writeFileSync(join(tempDir, 'partlens.config.json'), JSON.stringify({ router: { capacity: 3 } }));

      const config = loadConfig({ searchDir: tempDir, skipEnv: true });

      expect(config.router.capacity).toBe(3);
    });

    it('should report malformed config files', () => {
      const configPath = join(tempDir, 'broken.json');
      writeFileSync(configPath, '{ not json');

      expect(() => loadConfig({ configPath, skipEnv: true })).toThrow(/Failed to load configuration/);
    });
  });
});
