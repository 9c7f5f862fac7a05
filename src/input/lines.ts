/**
 * Line splitting that keeps terminators
 */

import { IO_ENCODING } from '../constants';
import type { InputSource, Line } from '../types';
import { InputSourceError } from '../utils/errors';

/**
 * Buffers incoming text chunks and returns complete lines, each still ending in '\n'.
 */
export class LineBuffer {
  // Pieces of the current unterminated line, joined once its '\n' arrives
  private pending: string[] = [];

  /** Append a chunk and return all complete lines (excluding the trailing partial). */
  push(chunk: string): Line[] {
    const lines: Line[] = [];

    let start = 0;
    let end = chunk.indexOf('\n');
    while (end !== -1) {
      const piece = chunk.slice(start, end + 1);
      if (this.pending.length > 0) {
        this.pending.push(piece);
        lines.push(this.pending.join(''));
        this.pending = [];
      } else {
        lines.push(piece);
      }
      start = end + 1;
      end = chunk.indexOf('\n', start);
    }

    if (start < chunk.length) {
      this.pending.push(chunk.slice(start));
    }
    return lines;
  }

  /** Return the unterminated remainder, if any, and reset. */
  flush(): Line | null {
    const rest = this.pending.join('');
    this.pending = [];
    return rest.length > 0 ? rest : null;
  }
}

/**
 * Yield the lines of a stream, in order, with their terminators
 */
export async function* readLines(stream: NodeJS.ReadableStream): AsyncGenerator<Line, void, undefined> {
  const buffer = new LineBuffer();

  for await (const chunk of stream) {
    const text = typeof chunk === 'string' ? chunk : chunk.toString(IO_ENCODING);
    yield* buffer.push(text);
  }

  const rest = buffer.flush();
  if (rest !== null) {
    yield rest;
  }
}

/**
 * Yield the lines of every source, one source after another.
 * A source's unterminated last line is never joined to the next source's first line.
 */
export async function* readSourceLines(sources: InputSource[]): AsyncGenerator<Line, void, undefined> {
  for (const source of sources) {
    let iterator: AsyncIterator<Line, void, undefined>;
    try {
      iterator = readLines(source.open());
    } catch (error) {
      throw new InputSourceError(source.name, error);
    }

    // Wrap read failures only
    try {
      while (true) {
        let next: IteratorResult<Line, void>;
        try {
          next = await iterator.next();
        } catch (error) {
          throw new InputSourceError(source.name, error);
        }
        if (next.done) break;
        yield next.value;
      }
    } finally {
      // Releases the stream when the consumer stops early
      await iterator.return?.();
    }
  }
}
