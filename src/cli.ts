/**
 * Command-line entry: arguments and streams in, exit code out
 */

import { isVerbose } from './constants';
import { filterImports } from './filter-imports';
import { resolveSources } from './input/sources';
import { createStreamWriter } from './output/writer';
import { isInputSourceError } from './utils/errors';

export interface CLIStreams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

/**
 * Filter the sources named by args to stdout.
 * Returns 0 on success, 1 when an input source can't be read; other errors are thrown.
 */
export async function run(
  args: string[],
  { stdin, stdout }: CLIStreams,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const sources = resolveSources(args, stdin);

  try {
    await filterImports(sources, createStreamWriter(stdout), { verbose: isVerbose(env) });
    return 0;
  } catch (error) {
    if (isInputSourceError(error)) {
      console.error(`[FAIL] ${error.message}`);
      return 1;
    }
    throw error;
  }
}
