import { describe, expect, it, vi } from 'vitest';
import { Lazy } from './lazy.js';
import type { SafeWrap } from './wrap.js';

describe('Lazy', () => {
  it('builds once and reuses the value', async () => {
    const build = vi.fn(async (): Promise<SafeWrap<Error, number>> => [null, 42]);
    const lazy = new Lazy(build);

    expect(lazy.ready).toBe(false);
    expect(await lazy.get()).toEqual([null, 42]);
    expect(await lazy.get()).toEqual([null, 42]);
    expect(build).toHaveBeenCalledTimes(1);
    expect(lazy.ready).toBe(true);
  });

  it('shares one build between concurrent callers', async () => {
    let release: (value: SafeWrap<Error, string>) => void = () => {};
    const build = vi.fn(
      () =>
        new Promise<SafeWrap<Error, string>>((resolve) => {
          release = resolve;
        }),
    );
    const lazy = new Lazy(build);

    const first = lazy.get();
    const second = lazy.get();
    release([null, 'table']);

    expect(await first).toEqual([null, 'table']);
    expect(await second).toEqual([null, 'table']);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('does not keep failures', async () => {
    const build = vi
      .fn<() => Promise<SafeWrap<Error, string>>>()
      .mockResolvedValueOnce([new Error('offline'), null])
      .mockResolvedValueOnce([null, 'table']);
    const lazy = new Lazy(build);

    const [err] = await lazy.get();
    expect(err?.message).toBe('offline');
    expect(lazy.ready).toBe(false);

    expect(await lazy.get()).toEqual([null, 'table']);
    expect(build).toHaveBeenCalledTimes(2);
  });

  it('rebuilds after reset', async () => {
    const build = vi.fn(async (): Promise<SafeWrap<Error, number>> => [null, 1]);
    const lazy = new Lazy(build);

    await lazy.get();
    lazy.reset();
    await lazy.get();

    expect(build).toHaveBeenCalledTimes(2);
  });
});
