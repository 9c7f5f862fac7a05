/**
 * Filter: Keep lines that are not imports
 */

import type { Line } from '../../types';
import type { Filter } from '../types';
import { IMPORT_PREFIX } from '../../constants';

/**
 * Raw prefix test, no trimming: an indented import is not an import here
 */
export function isImportLine(line: Line): boolean {
  return line.startsWith(IMPORT_PREFIX);
}

export class NonImportLineFilter implements Filter<Line> {
  name = 'non-import-lines';
  description = `Keep lines not starting with "${IMPORT_PREFIX}"`;

  keeps(line: Line): boolean {
    return !isImportLine(line);
  }
}
