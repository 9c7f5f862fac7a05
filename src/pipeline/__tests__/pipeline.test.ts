import { Readable } from 'stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { LINE_FILTERS, printPipelineStats, runPipeline, type Filter } from '..';

async function* from<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

const positive: Filter<number> = { name: 'positive', description: 'Keep positive', keeps: n => n > 0 };
const small: Filter<number> = { name: 'small', description: 'Keep below 100', keeps: n => n < 100 };

describe('runPipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('emits survivors in input order', async () => {
    const emitted: number[] = [];
    const result = await runPipeline(from([5, -1, 200, 7, 0, 42]), [positive, small], async n => {
      emitted.push(n);
    });

    expect(emitted).toEqual([5, 7, 42]);
    expect(result.inputCount).toBe(6);
    expect(result.outputCount).toBe(3);
  });

  it('counts only the items that reach each filter', async () => {
    const result = await runPipeline(from([5, -1, 200, 7, 0, 42]), [positive, small], async () => {});

    expect(result.stats).toEqual([
      { name: 'positive', description: 'Keep positive', inputCount: 6, keptCount: 4, removedCount: 2 },
      { name: 'small', description: 'Keep below 100', inputCount: 4, keptCount: 3, removedCount: 1 },
    ]);
  });

  it('emits each item before reading the next', async () => {
    const events: string[] = [];
    async function* traced(): AsyncGenerator<number> {
      for (const n of [1, 2]) {
        events.push(`read ${n}`);
        yield n;
      }
    }

    await runPipeline(traced(), [positive], async n => {
      events.push(`emit ${n}`);
    });

    expect(events).toEqual(['read 1', 'emit 1', 'read 2', 'emit 2']);
  });

  it('handles empty input', async () => {
    const result = await runPipeline(from<string>([]), LINE_FILTERS, async () => {});

    expect(result.inputCount).toBe(0);
    expect(result.outputCount).toBe(0);
    expect(result.stats[0].inputCount).toBe(0);
  });

  it('accepts any async iterable, such as a stream', async () => {
    const emitted: string[] = [];
    await runPipeline<string>(Readable.from(['import UIKit\n', 'let x = 5\n']), LINE_FILTERS, async line => {
      emitted.push(line);
    });

    expect(emitted).toEqual(['let x = 5\n']);
  });

  it('prints stats to stderr when verbose', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runPipeline(from(['import Foundation\n', 'import UIKit\n', 'let x = 5\n']), LINE_FILTERS, async () => {}, {
      verbose: true,
      label: 'filter-imports',
    });

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith(
      '[filter-imports] [non-import-lines-or-preserved-import] Kept 2/3 (filtered 1) - Keep items matching: non-import-lines OR preserved-import'
    );
    expect(stdout).not.toHaveBeenCalled();
  });

  it('prints nothing when not verbose', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    await runPipeline(from(['import UIKit\n']), LINE_FILTERS, async () => {});

    expect(stderr).not.toHaveBeenCalled();
  });
});

describe('printPipelineStats', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one line per filter without a label', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    printPipelineStats([
      { name: 'positive', description: 'Keep positive', inputCount: 3, keptCount: 2, removedCount: 1 },
      { name: 'small', description: 'Keep below 100', inputCount: 2, keptCount: 2, removedCount: 0 },
    ]);

    expect(stderr.mock.calls).toEqual([
      ['[positive] Kept 2/3 (filtered 1) - Keep positive'],
      ['[small] Kept 2/2 (filtered 0) - Keep below 100'],
    ]);
  });

  it('prints nothing for an empty pipeline', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    printPipelineStats([], 'label');

    expect(stderr).not.toHaveBeenCalled();
  });
});
