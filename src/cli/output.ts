/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 */

import chalk from 'chalk';
import type { IngestReport } from '../ingest/types.js';
import { formatPartType, type PartRecord } from '../parts/types.js';
import type { WorkerStats } from '../router/types.js';
import type { IndexStats, SearchOutcome, SearchResultItem, SearchWarning } from '../search/types.js';
import type { AvailableFilters, PartPage, PartStatistics } from '../storage/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Suppress non-essential output */
  quiet?: boolean;
}

const RULE = '━'.repeat(50);

/** Characters of description shown per search hit */
const DESCRIPTION_PREVIEW = 160;

function preview(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function formatWarnings(warnings: SearchWarning[]): void {
  for (const warning of warnings) {
    console.error(chalk.yellow(`⚠️  ${warning.code}: ${warning.message}`));
  }
}

/**
 * Format one search hit
 */
export function formatResultLine(result: SearchResultItem, rank: number): string[] {
  const scorePercent = (result.score * 100).toFixed(1);
  const lines = [
    `${chalk.bold(`${String(rank)}. ${result.id}`)}  ${result.label} ${chalk.gray(`[${scorePercent}%]`)}`,
    `   ${result.type} · ${result.sourceCollection}${result.matchedFields.length > 0 ? ` · matched: ${result.matchedFields.join(', ')}` : ''}`,
  ];
  if (result.description !== '') {
    lines.push(`   ${preview(result.description, DESCRIPTION_PREVIEW)}`);
  }
  return lines;
}

/**
 * Search outcomes printed as results; timeouts and capacity failures are
 * reported as agent errors instead
 */
export type ReportedSearchOutcome = Extract<SearchOutcome, { status: 'ok' | 'invalid_request' | 'error' }>;

/**
 * Format a search outcome. Non-ok outcomes are written to stderr.
 */
export function formatSearchOutcome(outcome: ReportedSearchOutcome, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }

  formatWarnings(outcome.warnings);

  switch (outcome.status) {
    case 'ok': {
      if (outcome.results.length === 0) {
        console.log('No results found.');
        return;
      }
      const source = outcome.meta.cached ? 'cache' : (outcome.meta.workerId ?? 'worker');
      console.log(
        `Found ${String(outcome.results.length)} result(s) ${chalk.gray(`(${outcome.meta.intent}, ${String(outcome.meta.latencyMs)}ms, ${source})`)}:\n`
      );
      outcome.results.forEach((result, i) => {
        console.log(RULE);
        for (const line of formatResultLine(result, i + 1)) {
          console.log(line);
        }
      });
      console.log('');
      return;
    }
    case 'invalid_request':
      console.error(chalk.red(`${outcome.message}:`));
      for (const issue of outcome.issues) {
        console.error(`  - ${issue}`);
      }
      return;
    case 'error':
      console.error(chalk.red(`Search failed (${outcome.code}): ${outcome.message}`));
      return;
  }
}

/**
 * Format a single part record
 */
export function formatPart(part: PartRecord, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify(part, null, 2));
    return;
  }

  console.log(chalk.bold(`${part.id}  ${part.label}`));
  console.log(`   Type: ${formatPartType(part.typeHierarchy)}`);
  console.log(`   Source: ${part.sourceCollection}`);
  if (part.metadata.organism !== undefined) {
    console.log(`   Organism: ${part.metadata.organism}`);
  }
  console.log(`   Usage: ${String(part.usageCount)} (success ${(part.successRate * 100).toFixed(0)}%)`);
  if (part.description !== '') {
    console.log('');
    console.log(`   ${part.description}`);
  }
  if (part.sequence !== '') {
    console.log('');
    console.log(`   Sequence (${String(part.sequence.length)} bp): ${preview(part.sequence, 60)}`);
  }
}

/**
 * Format a page of parts
 */
export function formatPartPage(
  page: PartPage,
  offset: number,
  filters: AvailableFilters | undefined,
  options: OutputOptions
): void {
  if (options.json === true) {
    console.log(JSON.stringify({ ...page, offset, availableFilters: filters }, null, 2));
    return;
  }

  if (page.parts.length === 0) {
    console.log('No parts match.');
  } else {
    const last = offset + page.parts.length;
    console.log(`Parts ${String(offset + 1)}-${String(last)} of ${String(page.totalCount)}:\n`);
    for (const part of page.parts) {
      console.log(`  ${chalk.cyan(part.id.padEnd(16))} ${part.label} ${chalk.gray(`(${formatPartType(part.typeHierarchy)})`)}`);
    }
  }

  if (filters !== undefined) {
    console.log('');
    console.log(chalk.bold('Available filters:'));
    console.log(`  Types: ${filters.types.join(', ') || '-'}`);
    console.log(`  Subtypes: ${filters.subtypes.join(', ') || '-'}`);
    console.log(`  Sources: ${filters.sources.join(', ') || '-'}`);
  }
}

/**
 * Format index, catalog and worker statistics
 */
export function formatStats(
  index: IndexStats,
  catalog: PartStatistics,
  workers: WorkerStats[],
  options: OutputOptions
): void {
  if (options.json === true) {
    console.log(JSON.stringify({ index, catalog, workers }, null, 2));
    return;
  }

  console.log(chalk.bold('Index'));
  console.log(`  Vectors: ${String(index.count)} (graph ${String(index.graphSize)}, tail ${String(index.tailSize)})`);
  console.log(`  Snapshot: v${String(index.snapshotVersion)} from ${new Date(index.snapshotCreatedAt).toISOString()}${index.stale ? chalk.yellow(' (stale)') : ''}`);
  console.log(`  Model: ${index.modelVersion}`);
  console.log(`  Avg query latency: ${index.avgQueryLatency.toFixed(1)}ms`);
  console.log(`  Cache hit rate: ${(index.cacheHitRate * 100).toFixed(1)}%`);

  console.log('');
  console.log(chalk.bold(`Catalog (${String(catalog.totalParts)} parts)`));
  for (const [type, count] of Object.entries(catalog.byType)) {
    console.log(`  ${type}: ${String(count)}`);
  }
  for (const [source, count] of Object.entries(catalog.bySource)) {
    console.log(`  ${chalk.gray(`source ${source}`)}: ${String(count)}`);
  }

  console.log('');
  console.log(chalk.bold('Workers'));
  for (const worker of workers) {
    const state =
      worker.state === 'healthy'
        ? chalk.green(worker.state)
        : worker.state === 'degraded'
          ? chalk.yellow(worker.state)
          : chalk.red(worker.state);
    console.log(
      `  ${worker.id}: ${state} load ${worker.load.toFixed(2)} latency ${worker.latencyEWMA.toFixed(1)}ms errors ${(worker.errorRate * 100).toFixed(0)}%`
    );
  }
}

/**
 * Format an ingest report
 */
export function formatIngestReport(report: IngestReport, snapshotId: number | undefined, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify({ ...report, snapshotId }, null, 2));
    return;
  }

  console.log('\nIngest complete:');
  console.log(`  Records: ${String(report.received)}`);
  console.log(`  Inserted: ${String(report.inserted)}`);
  console.log(`  Updated: ${String(report.updated)}`);
  console.log(`  Embedded: ${String(report.embedded)} (${String(report.reused)} reused)`);
  console.log(`  Index version: ${String(report.indexVersion)}`);
  if (snapshotId !== undefined) {
    console.log(`  Snapshot: #${String(snapshotId)}`);
  }
  console.log(`  Duration: ${(report.durationMs / 1000).toFixed(2)}s`);

  if (report.failed.length > 0) {
    console.log(chalk.yellow(`\n  ${String(report.failed.length)} record(s) failed:`));
    for (const failure of report.failed) {
      console.log(`   #${String(failure.index)} ${failure.id ?? '(no id)'} ${failure.code}: ${failure.message}`);
    }
  }
}
