/**
 * Host event handlers - window lifecycle, clicks and drag-and-drop
 */

import type { RegionLayout } from '../config';
import { beforeOrAfter } from '../geometry';
import type { HostWindow } from '../host';
import type { LayoutContext } from '../layout-state';
import type { Region } from '../region';
import type { Point } from '../types';
import { WrappedWindow } from '../wrapped-window';
import { findWindow, findRegionPosition } from './find';
import { findDefaultRegion } from './init';

/**
 * Track a newly opened window at the end of the default region
 *
 * @returns the region that took it, or null when it was ignored
 */
export function addNewWindow(
  ctx: LayoutContext,
  layout: RegionLayout,
  window: HostWindow
): Region | null {
  if (!window.isNormal()) return null;

  const existing = findWindow(ctx.state, window);
  if (existing) return existing.region;

  const region = findDefaultRegion(ctx.state, layout);
  if (!region) {
    ctx.log.warn('no region available for new window', { windowId: window.id });
    return null;
  }

  region.addWindowEnd(new WrappedWindow(window, region.box, ctx));
  region.reconcileWindows();
  return region;
}

/**
 * Forget a closed window and close the gap it left
 *
 * @returns the region it was removed from, or null if it was not tracked
 */
export function removeClosedWindow(ctx: LayoutContext, window: HostWindow): Region | null {
  const found = findWindow(ctx.state, window);
  if (!found) return null;

  found.region.removeWindow(found.wrappedWindow);
  found.region.reconcileWindows();

  if (ctx.state.focusedWindowId === window.id) {
    ctx.state.focusedWindowId = null;
  }
  return found.region;
}

/**
 * Hosts do not always report focus changes made with the mouse, so a click
 * compares the host's focused window with the one we last focused.
 */
export function syncFocusAfterClick(ctx: LayoutContext): boolean {
  const current = findWindow(ctx.state, ctx.host.focusedWindow());
  if (!current) return false;

  const previousId = ctx.state.focusedWindowId;
  if (previousId === current.wrappedWindow.id) return false;

  if (previousId !== null) {
    const previous = ctx.state.regionOf(previousId);
    const index = previous?.positionIndex.get(previousId);
    if (previous && index !== undefined) {
      previous.wrappedWindows[index]?.unfocus();
    }
  }

  return current.wrappedWindow.focus();
}

/**
 * Drop the focused window at `point`.
 *
 * Within its own region it steps one slot toward the target; over another
 * region it is inserted before or after the slot under the pointer.
 */
export function dropWindowAt(ctx: LayoutContext, point: Point): boolean {
  const current = findWindow(ctx.state, ctx.host.focusedWindow());
  if (!current) return false;

  const target = findRegionPosition(ctx.state, point);
  if (!target) return false;

  const { wrappedWindow, region: curRegion } = current;
  const { region: nextRegion, index: nextIndex, box } = target;
  const currentIndex = curRegion.positionIndex.get(wrappedWindow.id);
  if (currentIndex === undefined) return false;

  if (curRegion === nextRegion) {
    if (currentIndex === nextIndex) return false;
    return curRegion.swapNeighbor(currentIndex, currentIndex > nextIndex ? -1 : 1);
  }

  const placement = beforeOrAfter(point, box, nextRegion.isVertical);
  curRegion.removeWindow(wrappedWindow);
  if (placement === 'After') {
    nextRegion.addWindowAfter(wrappedWindow, nextIndex);
  } else {
    nextRegion.addWindowBefore(wrappedWindow, nextIndex);
  }
  ctx.state.regionMap.set(wrappedWindow.id, nextRegion.ref);

  curRegion.reconcileWindows();
  nextRegion.reconcileWindows();
  return true;
}
