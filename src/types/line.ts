/**
 * Line and input source types
 */

/**
 * One line of input, including its original terminator ('\n' or '\r\n').
 * The final line of a source has no terminator when the source doesn't end with one.
 */
export type Line = string;

/**
 * A named input, opened lazily when its turn comes
 */
export interface InputSource {
  name: string;  // File path, or '<stdin>'
  open(): NodeJS.ReadableStream;
}

/**
 * Writes one kept line to the output
 */
export type LineWriter = (line: Line) => Promise<void>;
