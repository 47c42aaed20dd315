import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PartlensConfigSchema } from '../../../src/config/schema.js';
import { handleToolCall } from '../../../src/mcp/server.js';
import { createRuntime, type Runtime } from '../../../src/runtime/runtime.js';
import { SAMPLE_PARTS } from '../../fixtures/parts.js';

function textOf(result: CallToolResult): string {
  const first = result.content[0];
  if (first === undefined || first.type !== 'text') {
    throw new Error('expected a text content block');
  }
  return first.text;
}

describe('MCP tool calls', () => {
  let runtime: Runtime;

  beforeAll(async () => {
    runtime = await createRuntime(
      PartlensConfigSchema.parse({
        embedding: { dimensions: 32 },
        storage: { databasePath: ':memory:' },
        logging: { level: 'error' },
      })
    );
    await runtime.ingestor.ingest(SAMPLE_PARTS);
  });

  afterAll(async () => {
    await runtime.close();
  });

  it('should return operation results as JSON text', async () => {
    const result = await handleToolCall(runtime, 'get_part', { id: 'BBa_J23100' });

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(textOf(result))).toMatchObject({
      id: 'BBa_J23100',
      sourceCollection: 'igem',
      usageCount: 120,
    });
  });

  it('should return typed search outcomes without flagging an error', async () => {
    const result = await handleToolCall(runtime, 'search_parts', { query: 'BBa_B0034 BBa_E0040' });

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(textOf(result))).toMatchObject({
      status: 'ok',
      meta: { intent: 'exact_id' },
    });
  });

  it('should map operation errors to isError results with their code', async () => {
    const result = await handleToolCall(runtime, 'get_part', { id: 'BBa_MISSING' });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({
      error: { code: 'NOT_FOUND', message: 'Part not found: BBa_MISSING' },
    });
  });

  it('should report unknown tools', async () => {
    const result = await handleToolCall(runtime, 'reindex_everything', {});

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({
      error: { code: 'UNKNOWN_OPERATION', message: 'Unknown operation: reindex_everything' },
    });
  });

  it('should report invalid arguments', async () => {
    const result = await handleToolCall(runtime, 'record_usage', { id: 'BBa_J23100' });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({
      error: { code: 'INVALID_INPUT', message: 'Invalid input for record_usage: success: Required' },
    });
  });
});
