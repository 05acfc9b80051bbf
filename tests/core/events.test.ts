import { describe, expect, it } from 'vitest';
import {
  addNewWindow,
  dropWindowAt,
  removeClosedWindow,
  syncFocusAfterClick,
} from '../../src/core/operations/events';
import { initDisplays } from '../../src/core/operations/init';
import {
  hostWithWindows,
  makeContext,
  regionNamed,
  twoRegionLayout,
  windowIds,
} from './fixtures';

/** left [1, 2] stacked, right [3] */
function setup() {
  const { host, windows } = hostWithWindows(3);
  const ctx = makeContext({}, host);
  initDisplays(ctx, twoRegionLayout);
  return {
    ctx,
    windows,
    left: regionNamed(ctx, 'd1', 'left'),
    right: regionNamed(ctx, 'd1', 'right'),
  };
}

describe('addNewWindow', () => {
  it('appends a new window to the default region', () => {
    const { ctx, left } = setup();
    const window = ctx.host.addWindow({ id: 4, frame: { x: 0, y: 0, width: 10, height: 10 } });

    expect(addNewWindow(ctx, twoRegionLayout, window)).toBe(left);
    expect(windowIds(left)).toEqual([1, 2, 4]);
    expect(ctx.state.regionOf(4)).toBe(left);
    expect(left.subRegions).toHaveLength(3);
  });

  it('ignores windows that are not normal', () => {
    const { ctx, left } = setup();
    const dialog = ctx.host.addWindow({
      id: 5,
      frame: { x: 0, y: 0, width: 10, height: 10 },
      normal: false,
    });

    expect(addNewWindow(ctx, twoRegionLayout, dialog)).toBeNull();
    expect(windowIds(left)).toEqual([1, 2]);
  });

  it('does not track a window twice', () => {
    const { ctx, windows, right } = setup();

    expect(addNewWindow(ctx, twoRegionLayout, windows[2])).toBe(right);
    expect(windowIds(right)).toEqual([3]);
  });
});

describe('removeClosedWindow', () => {
  it('closes the gap left by the window', () => {
    const { ctx, windows, left } = setup();
    const [first, second] = windows;
    ctx.state.focusedWindowId = 1;
    ctx.host.closeWindow(first);

    expect(removeClosedWindow(ctx, first)).toBe(left);
    expect(windowIds(left)).toEqual([2]);
    expect(second.frame()).toEqual({ x: 0, y: 0, width: 500, height: 800 });
    expect(ctx.state.focusedWindowId).toBeNull();
  });

  it('returns null for an untracked window', () => {
    const { ctx } = setup();
    const stranger = ctx.host.addWindow({ id: 50, frame: { x: 0, y: 0, width: 1, height: 1 } });

    expect(removeClosedWindow(ctx, stranger)).toBeNull();
  });
});

describe('syncFocusAfterClick', () => {
  it('adopts a focus change made with the mouse', () => {
    const { ctx, windows } = setup();
    ctx.state.focusedWindowId = 1;
    ctx.host.setFocused(windows[2] ?? null);

    expect(syncFocusAfterClick(ctx)).toBe(true);
    expect(ctx.state.focusedWindowId).toBe(3);
  });

  it('does nothing when focus did not change', () => {
    const { ctx, windows } = setup();
    ctx.state.focusedWindowId = 1;
    ctx.host.setFocused(windows[0] ?? null);

    expect(syncFocusAfterClick(ctx)).toBe(false);
  });
});

describe('dropWindowAt', () => {
  it('inserts before the slot when dropped on its first half', () => {
    const { ctx, windows, left, right } = setup();
    ctx.host.setFocused(windows[0] ?? null);

    expect(dropWindowAt(ctx, { x: 700, y: 100 })).toBe(true);
    expect(windowIds(left)).toEqual([2]);
    expect(windowIds(right)).toEqual([1, 3]);
    expect(ctx.state.regionOf(1)).toBe(right);
  });

  it('inserts after the slot when dropped on its second half', () => {
    const { ctx, windows, right } = setup();
    ctx.host.setFocused(windows[0] ?? null);

    dropWindowAt(ctx, { x: 900, y: 100 });
    expect(windowIds(right)).toEqual([3, 1]);
  });

  it('steps toward the target within the same region', () => {
    const { ctx, windows, left } = setup();
    ctx.host.setFocused(windows[0] ?? null);

    expect(dropWindowAt(ctx, { x: 100, y: 500 })).toBe(true);
    expect(windowIds(left)).toEqual([2, 1]);
  });

  it('ignores a drop onto its own slot', () => {
    const { ctx, windows, left } = setup();
    ctx.host.setFocused(windows[0] ?? null);

    expect(dropWindowAt(ctx, { x: 100, y: 100 })).toBe(false);
    expect(windowIds(left)).toEqual([1, 2]);
  });

  it('fills an empty region', () => {
    const { host, windows } = hostWithWindows(2);
    const ctx = makeContext({}, host);
    initDisplays(ctx, twoRegionLayout, {
      displays: {
        d1: {
          regions: {
            left: { wrappedWindows: [{ id: 1 }, { id: 2 }] },
            right: { wrappedWindows: [] },
          },
        },
      },
      currentStoreSlot: null,
    });
    host.setFocused(windows[0] ?? null);

    expect(dropWindowAt(ctx, { x: 700, y: 100 })).toBe(true);
    expect(windowIds(regionNamed(ctx, 'd1', 'right'))).toEqual([1]);
    expect(windows[0]?.frame()).toEqual({ x: 500, y: 0, width: 500, height: 800 });
  });

  it('needs a focused tracked window', () => {
    const { ctx } = setup();
    expect(dropWindowAt(ctx, { x: 700, y: 100 })).toBe(false);
  });
});
