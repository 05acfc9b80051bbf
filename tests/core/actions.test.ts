import { describe, expect, it } from 'vitest';
import { doAction, snapshotState } from '../../src/core/operations/actions';
import { initDisplays } from '../../src/core/operations/init';
import { hostWithWindows, makeContext, regionNamed, twoRegionLayout, windowIds } from './fixtures';

function setup() {
  const { host, windows } = hostWithWindows(3);
  const ctx = makeContext({}, host);
  initDisplays(ctx, twoRegionLayout);
  return { ctx, windows };
}

describe('doAction', () => {
  it('applies the action to the focused window', () => {
    const { ctx, windows } = setup();
    ctx.host.setFocused(windows[0] ?? null);

    expect(doAction(ctx, twoRegionLayout, 'move', 'east')).toBe(true);
    expect(windowIds(regionNamed(ctx, 'd1', 'right'))).toEqual([1, 3]);
  });

  it('focuses the first window of the default region when nothing is focused', () => {
    const { ctx } = setup();

    expect(doAction(ctx, twoRegionLayout, 'focus', 'east')).toBe(true);
    expect(ctx.host.focusedWindow()?.id).toBe(1);
  });

  it('ignores moves when nothing is focused', () => {
    const { ctx } = setup();

    expect(doAction(ctx, twoRegionLayout, 'move', 'east')).toBe(false);
    expect(windowIds(regionNamed(ctx, 'd1', 'left'))).toEqual([1, 2]);
  });
});

describe('snapshotState', () => {
  it('lists every region with its windows in order', () => {
    const { ctx } = setup();
    ctx.state.currentStoreSlot = '2';

    expect(snapshotState(ctx.state)).toEqual({
      displays: {
        d1: {
          regions: {
            left: {
              wrappedWindows: [
                { id: 1, title: 'window-1', app: 'app' },
                { id: 2, title: 'window-2', app: 'app' },
              ],
            },
            right: { wrappedWindows: [{ id: 3, title: 'window-3', app: 'app' }] },
          },
        },
      },
      currentStoreSlot: '2',
    });
  });
});
