/**
 * Lookups across the whole layout state
 */

import type { HostWindow } from '../host';
import type { LayoutState } from '../layout-state';
import type { Region } from '../region';
import { isPtInBox } from '../geometry';
import type { Point, Rectangle } from '../types';
import type { WrappedWindow } from '../wrapped-window';

export interface FoundWindow {
  wrappedWindow: WrappedWindow;
  region: Region;
}

export interface RegionPosition {
  region: Region;
  box: Rectangle;
  index: number;
}

/**
 * Resolve a host window to its wrapper and owning region
 *
 * @returns null when the window is not tracked
 */
export function findWindow(state: LayoutState, window: HostWindow | null): FoundWindow | null {
  if (!window) return null;

  const region = state.regionOf(window.id);
  if (!region) return null;

  const index = region.positionIndex.get(window.id);
  if (index === undefined) return null;

  const wrappedWindow = region.wrappedWindows[index];
  return wrappedWindow ? { wrappedWindow, region } : null;
}

/**
 * First region slot strictly containing `point`, using margin-free slots.
 * An empty region is tested as a single slot covering its box.
 */
export function findRegionPosition(state: LayoutState, point: Point): RegionPosition | null {
  for (const region of state.allRegions()) {
    const count = Math.max(region.wrappedWindows.length, 1);
    const subRegions = region.computeSubRegions(0, count);

    for (const [index, box] of subRegions.entries()) {
      if (isPtInBox(point, box)) {
        return { region, box, index };
      }
    }
  }
  return null;
}
