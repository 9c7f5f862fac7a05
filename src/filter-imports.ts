/**
 * Strip import lines, keeping the preserved import
 */

import { readSourceLines } from './input/lines';
import { LINE_FILTERS, runPipeline, type PipelineResult } from './pipeline';
import type { InputSource, LineWriter } from './types';

export interface FilterImportsOptions {
  verbose?: boolean;
}

/**
 * Read every line of every source, in order, and write the lines that survive LINE_FILTERS.
 * Throws InputSourceError on the first source that can't be read; lines already written stay written.
 */
export async function filterImports(
  sources: InputSource[],
  write: LineWriter,
  options: FilterImportsOptions = {}
): Promise<PipelineResult> {
  return runPipeline(readSourceLines(sources), LINE_FILTERS, write, {
    verbose: options.verbose,
    label: 'filter-imports',
  });
}
