/**
 * Pipeline/Filter Pattern - Central Registry
 *
 * LINE_FILTERS below is the single source of truth for which lines survive.
 * Filters run in order; a line removed by one filter never reaches the next.
 */

import type { Line } from '../types';
import type { Filter, FilterStats, PipelineResult } from './types';

// Import combinators
import { UnionFilter } from './combinators';

// Import all filters
import { NonImportLineFilter } from './filters/non-import-lines';
import { PreservedImportFilter } from './filters/preserved-import';

// Re-export types and utilities
export type { Filter, FilterStats, PipelineResult } from './types';
export { UnionFilter } from './combinators';
export { NonImportLineFilter, isImportLine } from './filters/non-import-lines';
export { PreservedImportFilter, mentionsPreservedImport } from './filters/preserved-import';

/**
 * Applied to every input line
 * Non-import lines pass; import lines pass only when they mention the preserved import
 */
export const LINE_FILTERS: Filter<Line>[] = [
  new UnionFilter([
    new NonImportLineFilter(),
    new PreservedImportFilter(),
  ]),
];

/**
 * Stream items through a filter pipeline, emitting each survivor as soon as it is decided
 */
export async function runPipeline<T>(
  items: AsyncIterable<T>,
  filters: Filter<T>[],
  emit: (item: T) => Promise<void>,
  options: { verbose?: boolean; label?: string } = {}
): Promise<PipelineResult> {
  const stats: FilterStats[] = filters.map(filter => ({
    name: filter.name,
    description: filter.description,
    inputCount: 0,
    keptCount: 0,
    removedCount: 0,
  }));
  let inputCount = 0;
  let outputCount = 0;

  for await (const item of items) {
    inputCount++;
    let kept = true;

    for (let i = 0; i < filters.length; i++) {
      stats[i].inputCount++;
      if (filters[i].keeps(item)) {
        stats[i].keptCount++;
      } else {
        stats[i].removedCount++;
        kept = false;
        break;
      }
    }

    if (kept) {
      outputCount++;
      await emit(item);
    }
  }

  if (options.verbose) {
    printPipelineStats(stats, options.label);
  }

  return { inputCount, outputCount, stats };
}

/**
 * Print a summary of pipeline stats (stderr: stdout carries the filtered text)
 */
export function printPipelineStats(stats: FilterStats[], label?: string): void {
  if (stats.length === 0) return;

  const prefix = label ? `[${label}] ` : '';
  for (const s of stats) {
    console.error(`${prefix}[${s.name}] Kept ${s.keptCount}/${s.inputCount} (filtered ${s.removedCount}) - ${s.description}`);
  }
}
