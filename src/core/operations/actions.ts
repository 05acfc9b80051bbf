/**
 * Keyboard-driven actions and state snapshots
 */

import type { RegionLayout } from '../config';
import type { LayoutContext, LayoutState } from '../layout-state';
import type { Direction, LayoutAction } from '../types';
import { findWindow } from './find';
import type { LayoutSnapshot } from './init';
import { findDefaultRegion } from './init';

/**
 * Apply a directional action to the host's focused window.
 *
 * With no tracked focused window, `focus` picks the first window of the
 * default region and the other actions do nothing.
 */
export function doAction(
  ctx: LayoutContext,
  layout: RegionLayout,
  action: LayoutAction,
  direction: Direction
): boolean {
  const found = findWindow(ctx.state, ctx.host.focusedWindow());

  if (!found) {
    if (action !== 'focus') return false;
    const first = findDefaultRegion(ctx.state, layout)?.wrappedWindows[0];
    return first ? first.focus() : false;
  }

  return found.region.do(action, found.wrappedWindow, direction);
}

export interface SnapshotWindow {
  id: number;
  title: string;
  app: string;
}

export interface StateSnapshot extends LayoutSnapshot {
  readonly displays: Record<
    string,
    { readonly regions: Record<string, { readonly wrappedWindows: SnapshotWindow[] }> }
  >;
}

/** Window membership of every region, for persistence */
export function snapshotState(state: LayoutState): StateSnapshot {
  const displays: StateSnapshot['displays'] = {};

  for (const display of state.displays.values()) {
    const regions: Record<string, { wrappedWindows: SnapshotWindow[] }> = {};
    for (const region of display.regions.values()) {
      regions[region.name] = {
        wrappedWindows: region.wrappedWindows.map((wrappedWindow) => ({
          id: wrappedWindow.id,
          title: wrappedWindow.title(),
          app: wrappedWindow.appName(),
        })),
      };
    }
    displays[display.id] = { regions };
  }

  return { displays, currentStoreSlot: state.currentStoreSlot };
}
