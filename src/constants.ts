/**
 * Configuration constants
 */

// Lines starting with this prefix (raw, untrimmed) are treated as imports
export const IMPORT_PREFIX = 'import';

// Import lines containing this substring anywhere are kept
export const PRESERVED_IMPORT = 'import Foundation';

// latin1 maps each byte to one code unit, so kept lines round-trip byte for byte
export const IO_ENCODING: BufferEncoding = 'latin1';

// Argument naming standard input in the source list
export const STDIN_ARGUMENT = '-';

// Set to 'true' to print per-filter stats to stderr after a successful run
export const VERBOSE_ENV_VAR = 'FILTER_IMPORTS_VERBOSE';

export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[VERBOSE_ENV_VAR] === 'true';
}
