import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AgentErrors,
  CLIError,
  ExitCode,
  InvalidArgumentError,
  formatAgentError,
  parsePositiveInt,
} from '../../../src/cli/errors.js';

describe('CLI errors', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('parsePositiveInt', () => {
    it('should fall back when the option is absent', () => {
      expect(parsePositiveInt(undefined, 'top-k', 10)).toBe(10);
    });

    it('should parse plain positive integers', () => {
      expect(parsePositiveInt('25', 'top-k', 10)).toBe(25);
      expect(parsePositiveInt(' 7 ', 'top-k', 10)).toBe(7);
    });

    it.each(['0', '-3', '2.5', '12abc', 'ten'])('should reject %s', (value) => {
      expect(() => parsePositiveInt(value, 'top-k', 10)).toThrow(InvalidArgumentError);
      expect(() => parsePositiveInt(value, 'top-k', 10)).toThrow('--top-k must be a positive integer');
    });
  });

  describe('formatAgentError', () => {
    it('should render the action and command as text', () => {
      vi.stubEnv('PARTLENS_OUTPUT', '');

      expect(formatAgentError(AgentErrors.partNotFound('BBa_X'))).toBe(
        [
          'Error: Part not found: BBa_X',
          '',
          'Action required: Check the id or search for the part by description',
          '',
          'Run: partlens search "BBa_X"',
        ].join('\n')
      );
    });

    it('should render JSON when asked', () => {
      const text = formatAgentError(AgentErrors.indexEmpty(), true);

      expect(JSON.parse(text)).toEqual({
        error: 'The index holds no parts',
        action_required: 'Ingest a part feed before searching',
        command: 'partlens ingest <feed.json>',
      });
    });

    it('should render JSON when PARTLENS_OUTPUT is json', () => {
      vi.stubEnv('PARTLENS_OUTPUT', 'json');

      expect(JSON.parse(formatAgentError(AgentErrors.configInvalid('cache.ttlMs: too small')))).toMatchObject({
        hint: 'cache.ttlMs: too small',
      });
    });
  });

  it('should carry agent info and exit code on CLIError', () => {
    const error = CLIError.withAgentInfo(AgentErrors.searchUnavailable('no_available_worker', 'all down'), ExitCode.UNAVAILABLE);

    expect(error.message).toBe('Search no available worker');
    expect(error.exitCode).toBe(ExitCode.UNAVAILABLE);
    expect(error.agentError?.hint).toBe('all down');
  });
});
