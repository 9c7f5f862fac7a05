/**
 * Pipeline/Filter pattern types
 */

/**
 * Base filter interface - all line filters implement this
 */
export interface Filter<T> {
  /** Unique identifier for the filter */
  name: string;
  /** Human-readable description shown in logs */
  description: string;
  /** Whether the item survives this filter */
  keeps(item: T): boolean;
}

/**
 * Stats tracked per filter over a run
 */
export interface FilterStats {
  name: string;
  description: string;
  inputCount: number;
  keptCount: number;
  removedCount: number;
}

/**
 * Pipeline execution result
 */
export interface PipelineResult {
  inputCount: number;
  outputCount: number;
  stats: FilterStats[];
}
