/**
 * Filter: Keep lines that mention the preserved import
 */

import type { Line } from '../../types';
import type { Filter } from '../types';
import { PRESERVED_IMPORT } from '../../constants';

/**
 * Substring test anywhere in the line, not a parse of the import
 */
export function mentionsPreservedImport(line: Line): boolean {
  return line.includes(PRESERVED_IMPORT);
}

export class PreservedImportFilter implements Filter<Line> {
  name = 'preserved-import';
  description = `Keep lines containing "${PRESERVED_IMPORT}"`;

  keeps(line: Line): boolean {
    return mentionsPreservedImport(line);
  }
}
