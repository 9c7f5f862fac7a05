/**
 * Filter combinators for composing filters
 */

import type { Filter } from './types';

/**
 * UnionFilter: Keep items that pass ANY of the sub-filters (OR logic)
 *
 * Each sub-filter can be tested and reused independently.
 */
export class UnionFilter<T> implements Filter<T> {
  name: string;
  description: string;

  constructor(private filters: Filter<T>[]) {
    this.name = filters.map(f => f.name).join('-or-');
    this.description = `Keep items matching: ${filters.map(f => f.name).join(' OR ')}`;
  }

  keeps(item: T): boolean {
    return this.filters.some(f => f.keeps(item));
  }
}
