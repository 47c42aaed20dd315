/**
 * Operation table for partlens
 *
 * Every externally callable operation is declared once here with its
 * description, JSON input schema, zod parser and handler. The MCP server and
 * tests dispatch through this table.
 */

import { z } from 'zod';
import { PartFiltersSchema } from '../parts/types.js';
import type { Runtime } from '../runtime/runtime.js';

/**
 * JSON Schema of an operation's arguments, as advertised to MCP clients
 */
export interface JsonInputSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
}

export interface OperationDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonInputSchema;
  /** Validate raw arguments and run the handler */
  invoke(args: unknown, runtime: Runtime): Promise<unknown>;
}

/**
 * Operation error codes
 */
export enum OperationErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  UNKNOWN_OPERATION = 'UNKNOWN_OPERATION',
}

export class OperationError extends Error {
  constructor(
    message: string,
    public readonly code: OperationErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'OperationError';
  }
}

function defineOperation<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  inputSchema: JsonInputSchema;
  input: S;
  handler: (input: z.output<S>, runtime: Runtime) => Promise<unknown> | unknown;
}): OperationDefinition {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async invoke(args: unknown, runtime: Runtime): Promise<unknown> {
      const parsed = definition.input.safeParse(args ?? {});
      if (!parsed.success) {
        const details = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
          .join('; ');
        throw new OperationError(`Invalid input for ${definition.name}: ${details}`, OperationErrorCode.INVALID_INPUT);
      }
      return definition.handler(parsed.data, runtime);
    },
  };
}

const filterProperties: Record<string, Record<string, unknown>> = {
  types: {
    type: 'array',
    items: { type: 'string' },
    description: 'Part types to include, matched against any hierarchy level (e.g. "promoter")',
  },
  sources: {
    type: 'array',
    items: { type: 'string' },
    description: 'Source collections to include (igem, lab, addgene, snapgene, yunzhou, other)',
  },
  organism: {
    type: 'string',
    description: 'Host organism, exact match ignoring case',
  },
};

const FilterInput = {
  types: PartFiltersSchema.shape.types,
  sources: PartFiltersSchema.shape.sources,
  organism: PartFiltersSchema.shape.organism,
};

const SearchPartsInput = z.object({
  query: z.string().default(''),
  ...FilterInput,
  top_k: z.number().int().min(1).optional(),
  timeout_ms: z.number().int().min(1).optional(),
});

const PartIdInput = z.object({ id: z.string().trim().min(1) });

const ListPartsInput = z.object({
  ...FilterInput,
  limit: z.number().int().min(1).max(500).default(20),
  offset: z.number().int().min(0).default(0),
  order_by: z.enum(['id', 'usage']).default('id'),
  include_filters: z.boolean().default(false),
});

const IngestPartsInput = z.object({
  records: z.array(z.unknown()).min(1),
  persist: z.boolean().default(true),
});

const RecordUsageInput = z.object({
  id: z.string().trim().min(1),
  success: z.boolean(),
});

const EmptyInput = z.object({});

export const OPERATIONS: readonly OperationDefinition[] = [
  defineOperation({
    name: 'search_parts',
    description:
      'Semantic search over the parts catalog. Returns ranked parts with scores, or a typed outcome (timeout, overload, no_available_worker, invalid_request).',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Natural language query or part ids (e.g. "strong constitutive promoter")' },
        ...filterProperties,
        top_k: { type: 'number', description: 'Maximum results to return (default: 10)' },
        timeout_ms: { type: 'number', description: 'Deadline for the search in milliseconds (default: 2000)' },
      },
      required: [],
    },
    input: SearchPartsInput,
    handler: (input, runtime) => {
      const filters: z.input<typeof PartFiltersSchema> = {};
      if (input.types !== undefined) filters.types = input.types;
      if (input.sources !== undefined) filters.sources = input.sources;
      if (input.organism !== undefined) filters.organism = input.organism;
      return runtime.service.search({
        queryText: input.query,
        filters,
        topK: input.top_k,
        timeoutMs: input.timeout_ms,
      });
    },
  }),

  defineOperation({
    name: 'get_part',
    description: 'Fetch one part record by id.',
    inputSchema: {
      type: 'object',
      properties: { id: { type: 'string', description: 'Part id (e.g. "BBa_J23100")' } },
      required: ['id'],
    },
    input: PartIdInput,
    handler: (input, runtime) => {
      const part = runtime.storage.getPart(input.id);
      if (part === null) {
        throw new OperationError(`Part not found: ${input.id}`, OperationErrorCode.NOT_FOUND);
      }
      return part;
    },
  }),

  defineOperation({
    name: 'list_parts',
    description: 'List parts matching filters, with pagination. Optionally returns the available filter values.',
    inputSchema: {
      type: 'object',
      properties: {
        ...filterProperties,
        limit: { type: 'number', description: 'Page size (default: 20, max: 500)' },
        offset: { type: 'number', description: 'Records to skip (default: 0)' },
        order_by: { type: 'string', enum: ['id', 'usage'], description: 'Sort order (default: id)' },
        include_filters: { type: 'boolean', description: 'Include distinct types, subtypes and sources' },
      },
      required: [],
    },
    input: ListPartsInput,
    handler: (input, runtime) => {
      const page = runtime.storage.listParts(
        { types: input.types, sources: input.sources, organism: input.organism },
        { limit: input.limit, offset: input.offset, orderBy: input.order_by }
      );
      return {
        total_count: page.totalCount,
        limit: input.limit,
        offset: input.offset,
        parts: page.parts,
        ...(input.include_filters ? { available_filters: runtime.storage.getAvailableFilters() } : {}),
      };
    },
  }),

  defineOperation({
    name: 'index_stats',
    description: 'Index size, snapshot version and freshness, cache hit rate, average query latency and catalog statistics.',
    inputSchema: { type: 'object', properties: {}, required: [] },
    input: EmptyInput,
    handler: (_input, runtime) => ({
      ...runtime.service.getIndexStats(),
      catalog: runtime.storage.getStatistics(),
      cache: runtime.cache.stats(),
    }),
  }),

  defineOperation({
    name: 'worker_stats',
    description: 'State, load and latency of each search worker.',
    inputSchema: { type: 'object', properties: {}, required: [] },
    input: EmptyInput,
    handler: (_input, runtime) => runtime.service.getWorkerStats(),
  }),

  defineOperation({
    name: 'ingest_parts',
    description:
      'Add or update part records. Only records whose text or model changed are re-embedded; per-record failures are reported without aborting the batch.',
    inputSchema: {
      type: 'object',
      properties: {
        records: {
          type: 'array',
          items: { type: 'object' },
          description: 'Part records: id, label, typeHierarchy {level1, level2?, level3?}, description, sourceCollection, metadata',
        },
        persist: { type: 'boolean', description: 'Save an index snapshot afterwards (default: true)' },
      },
      required: ['records'],
    },
    input: IngestPartsInput,
    handler: async (input, runtime) => {
      const report = await runtime.ingestor.ingest(input.records);
      const changed = report.inserted + report.updated > 0;
      const snapshotId = input.persist && changed ? await runtime.saveSnapshot() : undefined;
      return { ...report, snapshotId };
    },
  }),

  defineOperation({
    name: 'record_usage',
    description: 'Record one use of a part and whether it succeeded; feeds the popularity prior.',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Part id' },
        success: { type: 'boolean', description: 'Whether the part worked in the experiment' },
      },
      required: ['id', 'success'],
    },
    input: RecordUsageInput,
    handler: (input, runtime) => {
      if (!runtime.storage.recordUsage(input.id, input.success)) {
        throw new OperationError(`Part not found: ${input.id}`, OperationErrorCode.NOT_FOUND);
      }
      runtime.cache.invalidate(input.id);
      const part = runtime.storage.getPart(input.id);
      return {
        id: input.id,
        usageCount: part?.usageCount ?? 0,
        successRate: part?.successRate ?? 0,
      };
    },
  }),

  defineOperation({
    name: 'delete_part',
    description: 'Remove a part from the catalog and the index.',
    inputSchema: {
      type: 'object',
      properties: { id: { type: 'string', description: 'Part id' } },
      required: ['id'],
    },
    input: PartIdInput,
    handler: async (input, runtime) => {
      const deleted = await runtime.ingestor.remove(input.id);
      if (!deleted) {
        throw new OperationError(`Part not found: ${input.id}`, OperationErrorCode.NOT_FOUND);
      }
      return { id: input.id, deleted };
    },
  }),
];

const OPERATIONS_BY_NAME: ReadonlyMap<string, OperationDefinition> = new Map(
  OPERATIONS.map((operation) => [operation.name, operation])
);

export function getOperation(name: string): OperationDefinition | undefined {
  return OPERATIONS_BY_NAME.get(name);
}

/**
 * Run an operation by name
 */
export async function invokeOperation(name: string, args: unknown, runtime: Runtime): Promise<unknown> {
  const operation = getOperation(name);
  if (operation === undefined) {
    throw new OperationError(`Unknown operation: ${name}`, OperationErrorCode.UNKNOWN_OPERATION);
  }
  return operation.invoke(args, runtime);
}
