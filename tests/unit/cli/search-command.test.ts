import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { registerSearchCommand } from '../../../src/cli/commands/search.js';
import { AgentErrors, ExitCode, formatAgentError } from '../../../src/cli/errors.js';
import { PartStorage } from '../../../src/storage/parts.js';

class ExitCalled extends Error {
  constructor(public readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
    this.name = 'ExitCalled';
  }
}

describe('search command', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'partlens-cli-test-'));
    configPath = join(tempDir, 'partlens.config.json');
    writeFileSync(
      configPath,
      JSON.stringify({
        embedding: { dimensions: 32 },
        storage: { databasePath: join(tempDir, 'parts.db') },
        logging: { level: 'error' },
      })
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should close the catalog before exiting on an empty index', async () => {
    vi.stubEnv('PARTLENS_OUTPUT', '');
    const closeSpy = vi.spyOn(PartStorage.prototype, 'close');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });

    const program = new Command().option('-c, --config <path>');
    registerSearchCommand(program);

    await expect(program.parseAsync(['node', 'partlens', '--config', configPath, 'search', 'gfp'])).rejects.toBeInstanceOf(
      ExitCalled
    );

    expect(exitSpy.mock.calls[0]).toEqual([ExitCode.EMPTY_INDEX]);
    expect(errorSpy.mock.calls[0]).toEqual([formatAgentError(AgentErrors.indexEmpty())]);
    expect(closeSpy).toHaveBeenCalledTimes(1);
    expect(closeSpy.mock.invocationCallOrder[0] ?? Infinity).toBeLessThan(exitSpy.mock.invocationCallOrder[0] ?? 0);
  });
});
