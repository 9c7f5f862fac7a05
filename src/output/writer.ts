/**
 * Line output
 */

import { once } from 'events';
import { IO_ENCODING } from '../constants';
import type { LineWriter } from '../types';

/**
 * Write lines to a stream one at a time, waiting for 'drain' when the stream is full
 */
export function createStreamWriter(stream: NodeJS.WritableStream): LineWriter {
  return async (line) => {
    if (!stream.write(line, IO_ENCODING)) {
      await once(stream, 'drain');
    }
  };
}
