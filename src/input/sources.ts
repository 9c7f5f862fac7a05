/**
 * Input source resolution
 *
 * Command-line arguments are resolved once, at startup, into an ordered list of sources.
 * Files are opened only when the reader reaches them, so a missing file fails
 * after everything before it has been written.
 */

import { createReadStream } from 'fs';
import { STDIN_ARGUMENT } from '../constants';
import type { InputSource } from '../types';

export const STDIN_SOURCE_NAME = '<stdin>';

export function stdinSource(stdin: NodeJS.ReadableStream): InputSource {
  return {
    name: STDIN_SOURCE_NAME,
    open: () => stdin,
  };
}

export function fileSource(path: string): InputSource {
  return {
    name: path,
    open: () => createReadStream(path),
  };
}

/**
 * Resolve positional arguments into input sources.
 * No arguments means stdin; '-' means stdin at that position.
 */
export function resolveSources(
  args: string[],
  stdin: NodeJS.ReadableStream = process.stdin
): InputSource[] {
  if (args.length === 0) {
    return [stdinSource(stdin)];
  }

  return args.map(arg => (arg === STDIN_ARGUMENT ? stdinSource(stdin) : fileSource(arg)));
}
