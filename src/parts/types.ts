/**
 * Part record model for partlens
 */

import { z } from 'zod';

/**
 * Canonical source collections
 */
export const SOURCE_COLLECTIONS = ['igem', 'lab', 'addgene', 'snapgene', 'yunzhou', 'other'] as const;

export type SourceCollection = (typeof SOURCE_COLLECTIONS)[number];

const SOURCE_ALIASES: Record<string, SourceCollection> = {
  'igem registry': 'igem',
  igem: 'igem',
  laboratory: 'lab',
  lab: 'lab',
  addgene: 'addgene',
  snapgene: 'snapgene',
  yunzhou: 'yunzhou',
  other: 'other',
};

/**
 * Map a source name or alias to its canonical collection; unknown names map to `other`
 */
export function normalizeSource(value: string): SourceCollection {
  return SOURCE_ALIASES[value.trim().toLowerCase()] ?? 'other';
}

export const TypeHierarchySchema = z.object({
  level1: z.string().trim().min(1),
  level2: z.string().trim().min(1).optional(),
  level3: z.string().trim().min(1).optional(),
});

export const PartMetadataSchema = z
  .object({
    organism: z.string().optional(),
    expressionSystem: z.string().optional(),
    validationState: z.string().optional(),
  })
  .passthrough();

/**
 * Validated part record. Ingest accepts source aliases and fills defaults.
 */
export const PartRecordSchema = z.object({
  id: z.string().trim().min(1),
  label: z.string().trim().min(1),
  description: z.string().default(''),
  sequence: z.string().default(''),
  typeHierarchy: TypeHierarchySchema,
  sourceCollection: z.string().default('other').transform(normalizeSource),
  metadata: PartMetadataSchema.default({}),
  usageCount: z.number().int().min(0).default(0),
  successRate: z.number().min(0).max(1).default(0),
});

export type TypeHierarchy = z.infer<typeof TypeHierarchySchema>;
export type PartMetadata = z.infer<typeof PartMetadataSchema>;
export type PartRecord = z.output<typeof PartRecordSchema>;
export type PartRecordInput = z.input<typeof PartRecordSchema>;

/**
 * Hard filters shared by search and listing
 */
export const PartFiltersSchema = z.object({
  types: z.array(z.string().trim().min(1)).optional(),
  sources: z.array(z.string().trim().min(1).transform(normalizeSource)).optional(),
  organism: z.string().trim().min(1).optional(),
});

export type PartFilters = z.output<typeof PartFiltersSchema>;
export type PartFiltersInput = z.input<typeof PartFiltersSchema>;

export function hasFilters(filters: PartFilters | undefined): boolean {
  if (filters === undefined) return false;
  return (
    (filters.types?.length ?? 0) > 0 ||
    (filters.sources?.length ?? 0) > 0 ||
    filters.organism !== undefined
  );
}

/**
 * Text embedded for a part: label, type levels, description, organism and
 * expression system, blanks dropped
 */
export function composeEmbeddingText(part: PartRecord): string {
  return [
    part.label,
    part.typeHierarchy.level1,
    part.typeHierarchy.level2,
    part.typeHierarchy.level3,
    part.description,
    part.metadata.organism,
    part.metadata.expressionSystem,
  ]
    .map((value) => value?.trim() ?? '')
    .filter((value) => value !== '')
    .join(' ');
}

/**
 * Display form of a type hierarchy, e.g. "DNA Elements / Regulatory"
 */
export function formatPartType(hierarchy: TypeHierarchy): string {
  return [hierarchy.level1, hierarchy.level2, hierarchy.level3]
    .filter((level): level is string => level !== undefined)
    .join(' / ');
}
