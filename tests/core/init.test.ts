import { describe, expect, it } from 'vitest';
import type { RegionLayout } from '../../src/core/config';
import {
  distributeWindows,
  findDefaultRegion,
  initDisplays,
  regionBoxFor,
} from '../../src/core/operations/init';
import { MemoryHost } from '../../src/host/memory-host';
import {
  hostWithWindows,
  makeContext,
  regionConfig,
  regionNamed,
  twoRegionLayout,
  windowIds,
} from './fixtures';

describe('distributeWindows', () => {
  it('gives the remainder to the first groups', () => {
    expect(distributeWindows([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5], [6, 7]]);
  });

  it('leaves trailing groups empty when there are fewer items', () => {
    expect(distributeWindows([1, 2], 3)).toEqual([[1], [2], []]);
  });

  it('returns no groups for zero regions', () => {
    expect(distributeWindows([1, 2], 0)).toEqual([]);
  });
});

describe('regionBoxFor', () => {
  const display = { x: 100, y: 50, width: 1000, height: 800 };

  it('scales fractions against the display and truncates', () => {
    expect(regionBoxFor(display, regionConfig([0.5, 0.25], 0.5, 0.333))).toEqual({
      x: 600,
      y: 250,
      width: 500,
      height: 266,
    });
  });

  it('anchors a zero start at the display origin', () => {
    expect(regionBoxFor(display, regionConfig([0, 0], 1, 1))).toEqual(display);
  });
});

describe('initDisplays', () => {
  it('spreads live windows across regions in order', () => {
    const { host } = hostWithWindows(3);
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout);

    expect(windowIds(regionNamed(ctx, 'd1', 'left'))).toEqual([1, 2]);
    expect(windowIds(regionNamed(ctx, 'd1', 'right'))).toEqual([3]);
    expect(ctx.state.regionMap.get(3)).toEqual({ displayId: 'd1', regionName: 'right' });
    expect(ctx.state.currentStoreSlot).toBeNull();
  });

  it('restores stored membership and homes unknown windows in the default region', () => {
    const { host } = hostWithWindows(3);
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout, {
      displays: {
        d1: {
          regions: {
            left: { wrappedWindows: [{ id: 3 }] },
            right: { wrappedWindows: [{ id: 1 }, { id: 99 }] },
          },
        },
      },
      currentStoreSlot: '4',
    });

    expect(windowIds(regionNamed(ctx, 'd1', 'left'))).toEqual([3, 2]);
    expect(windowIds(regionNamed(ctx, 'd1', 'right'))).toEqual([1]);
    expect(ctx.state.regionMap.has(99)).toBe(false);
    expect(ctx.state.currentStoreSlot).toBe('4');
  });

  it('ignores windows that are not normal', () => {
    const { host } = hostWithWindows(1);
    host.addWindow({ id: 9, frame: { x: 0, y: 0, width: 10, height: 10 }, normal: false });
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout);

    expect(ctx.state.regionMap.has(9)).toBe(false);
    expect(ctx.state.trackedWindowCount()).toBe(1);
  });

  it('gives an unconfigured display a single full-screen region', () => {
    const { host, windows } = hostWithWindows(2);
    const ctx = makeContext({}, host);
    initDisplays(ctx, { displays: {} });

    const main = regionNamed(ctx, 'd1', 'main');
    expect(main.isDefault).toBe(true);
    expect(windowIds(main)).toEqual([1, 2]);
    expect(windows[1]?.frame()).toEqual({ x: 500, y: 0, width: 500, height: 800 });
  });

  it('spreads windows across displays', () => {
    const { host } = hostWithWindows(3);
    host.addScreen('d2', { x: 1000, y: 0, width: 800, height: 600 });
    const ctx = makeContext({}, host);
    initDisplays(ctx, { displays: {} });

    expect(windowIds(regionNamed(ctx, 'd1', 'main'))).toEqual([1, 2]);
    expect(windowIds(regionNamed(ctx, 'd2', 'main'))).toEqual([3]);
  });

  it('remembers the focused window when it is tracked', () => {
    const { host, windows } = hostWithWindows(2);
    host.setFocused(windows[1] ?? null);
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout);

    expect(ctx.state.focusedWindowId).toBe(2);
  });

  it('leaves frames alone without auto distribution', () => {
    const { host, windows } = hostWithWindows(1);
    const ctx = makeContext({ autoDistribute: false }, host);
    initDisplays(ctx, twoRegionLayout);

    expect(windows[0]?.frame()).toEqual({ x: 0, y: 0, width: 100, height: 100 });
    expect(regionNamed(ctx, 'd1', 'left').subRegions).toEqual([]);
  });
});

describe('findDefaultRegion', () => {
  it('prefers the configured default region', () => {
    const layout: RegionLayout = {
      ...twoRegionLayout,
      defaultRegion: { displayId: 'd1', regionName: 'right' },
    };
    const ctx = makeContext({}, new MemoryHost());
    ctx.host.addScreen('d1', { x: 0, y: 0, width: 1000, height: 800 });
    initDisplays(ctx, layout);

    expect(findDefaultRegion(ctx.state, layout)?.name).toBe('right');
  });

  it('falls back to the region flagged as default', () => {
    const { host } = hostWithWindows(0);
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout);

    expect(findDefaultRegion(ctx.state, twoRegionLayout)?.name).toBe('left');
  });

  it('uses the first region when nothing is flagged', () => {
    const layout: RegionLayout = {
      displays: { d1: { only: regionConfig([0, 0], 1, 1) } },
    };
    const { host } = hostWithWindows(0);
    const ctx = makeContext({}, host);
    initDisplays(ctx, layout);

    expect(findDefaultRegion(ctx.state, layout)?.name).toBe('only');
  });
});
