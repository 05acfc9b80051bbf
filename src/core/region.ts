/**
 * Region - a named area of a display holding an ordered stack of windows
 *
 * Any change to membership or order rebuilds `positionIndex`; callers then
 * reconcile so that every member's frame matches its slot again.
 */

import type { RegionConfig } from './config';
import { getDistance, getSubRegions, isAfter, isBelow } from './geometry';
import type { LayoutContext } from './layout-state';
import { indexDirectionOf, isVerticalDirection, sameRegionRef } from './types';
import type {
  Adjacency,
  Direction,
  DisplayId,
  LayoutAction,
  Point,
  Rectangle,
  RegionRef,
  WindowId,
} from './types';
import type { WrappedWindow } from './wrapped-window';

export interface RegionOptions {
  name: string;
  displayId: DisplayId;
  box: Rectangle;
  config: RegionConfig;
  wrappedWindows: WrappedWindow[];
  ctx: LayoutContext;
}

const regionKey = (ref: RegionRef): string => `${ref.displayId}/${ref.regionName}`;

export class Region {
  readonly name: string;
  readonly displayId: DisplayId;
  readonly box: Rectangle;
  readonly isVertical: boolean;
  readonly isDefault: boolean;
  readonly adjacent: Adjacency;

  wrappedWindows: WrappedWindow[];
  positionIndex = new Map<WindowId, number>();
  subRegions: Rectangle[] = [];

  private readonly ctx: LayoutContext;

  constructor(options: RegionOptions) {
    this.name = options.name;
    this.displayId = options.displayId;
    this.box = { ...options.box };
    this.isVertical = options.config.verticalLayout;
    this.isDefault = options.config.isDefault;
    this.adjacent = options.config.adjacent;
    this.wrappedWindows = [...options.wrappedWindows];
    this.ctx = options.ctx;
    this.reindexWindows();
  }

  get ref(): RegionRef {
    return { displayId: this.displayId, regionName: this.name };
  }

  hasWindow(windowId: WindowId): boolean {
    return this.positionIndex.has(windowId);
  }

  /**
   * Perform a directional action for one of this region's windows.
   *
   * The action stays inside the region when the direction runs along its
   * stacking axis and there is a neighbour that way; otherwise it is handed to
   * the adjacent region.
   *
   * @returns whether anything changed
   */
  do(action: LayoutAction, wrappedWindow: WrappedWindow, direction: Direction): boolean {
    const index = this.positionIndex.get(wrappedWindow.id);
    const indexDirection = indexDirectionOf(direction);
    const alongAxis = this.isVertical === isVerticalDirection(direction);

    if (index !== undefined && alongAxis && this.wrappedWindows[index + indexDirection]) {
      switch (action) {
        case 'move':
        case 'swap':
          return this.swapNeighbor(index, indexDirection);
        case 'focus':
          return this.focusNeighbor(index, indexDirection);
      }
    }

    switch (action) {
      case 'move':
        return this.moveRegion(wrappedWindow, direction);
      case 'swap':
        return this.swapRegion(wrappedWindow, direction);
      case 'focus':
        return this.focusRegion(wrappedWindow, direction);
    }
  }

  /** Exchange the window at `currentIndex` with its neighbour; also serves `move` */
  swapNeighbor(currentIndex: number, indexDirection: number): boolean {
    const newIndex = currentIndex + indexDirection;
    const current = this.wrappedWindows[currentIndex];
    const neighbour = this.wrappedWindows[newIndex];
    if (!current || !neighbour) return false;

    this.wrappedWindows[currentIndex] = neighbour;
    this.wrappedWindows[newIndex] = current;

    this.reindexWindows();
    this.reconcileWindows();
    return true;
  }

  focusNeighbor(currentIndex: number, indexDirection: number): boolean {
    const current = this.wrappedWindows[currentIndex];
    const next = this.wrappedWindows[currentIndex + indexDirection];
    if (!current || !next) return false;

    const topLeft = next.topLeft();
    next.focus();
    current.unfocus();

    if (this.ctx.config.mouseFollow) {
      this.ctx.host.moveMouse(topLeft);
    }
    return true;
  }

  /** Hand a window to the region adjacent in `direction`, if there is one */
  moveRegion(wrappedWindow: WrappedWindow, direction: Direction, isSwap = false): boolean {
    const adjacent = this.getAdjacent(direction);
    if (!adjacent) {
      this.ctx.log.debug('no adjacent region', { region: this.name, direction });
      return false;
    }

    const nextRegion = this.ctx.state.getRegion(adjacent);
    if (!nextRegion || nextRegion === this) {
      this.ctx.log.warn('adjacent region not found', { region: this.name, ...adjacent });
      return false;
    }

    if (!this.placeWindows(wrappedWindow, nextRegion, isSwap)) return false;

    this.ctx.state.regionMap.set(wrappedWindow.id, nextRegion.ref);

    this.reconcileWindows();
    nextRegion.reconcileWindows();
    return true;
  }

  swapRegion(wrappedWindow: WrappedWindow, direction: Direction): boolean {
    return this.moveRegion(wrappedWindow, direction, true);
  }

  /**
   * Put a window from this region into `nextRegion` next to the window there
   * closest to it. With `isSwap` the two windows trade places instead.
   */
  placeWindows(wrappedWindow: WrappedWindow, nextRegion: Region, isSwap: boolean): boolean {
    const currentIndex = this.positionIndex.get(wrappedWindow.id);
    if (currentIndex === undefined) return false;

    const closest = nextRegion.findClosestWindow(wrappedWindow.topLeft());

    if (!closest) {
      nextRegion.addWindowStart(wrappedWindow);
      this.removeWindow(wrappedWindow);
      return true;
    }

    const closestIndex = nextRegion.positionIndex.get(closest.id);
    if (closestIndex === undefined) return false;

    if (isSwap) {
      this.wrappedWindows[currentIndex] = closest;
      nextRegion.wrappedWindows[closestIndex] = wrappedWindow;
      this.ctx.state.regionMap.set(closest.id, this.ref);
      this.ctx.state.regionMap.set(wrappedWindow.id, nextRegion.ref);
    } else {
      const currBox = wrappedWindow.frame();
      const nextBox = closest.frame();
      const isNext = nextRegion.isVertical ? isBelow(currBox, nextBox) : isAfter(currBox, nextBox);

      if (isNext) {
        nextRegion.addWindowAfter(wrappedWindow, closestIndex);
      } else {
        nextRegion.addWindowBefore(wrappedWindow, closestIndex);
      }
      this.removeWindow(wrappedWindow);
    }

    this.reindexWindows();
    nextRegion.reindexWindows();
    return true;
  }

  /** Nearest member by top-left corner distance */
  findClosestWindow(
    coords: Point,
    candidates: readonly WrappedWindow[] = this.wrappedWindows
  ): WrappedWindow | undefined {
    let closestDistance: number | undefined;
    let closestWindow: WrappedWindow | undefined;

    for (const candidate of candidates) {
      const distance = getDistance(coords, candidate.topLeft());
      if (closestDistance === undefined || distance < closestDistance) {
        closestDistance = distance;
        closestWindow = candidate;
      }
    }

    return closestWindow;
  }

  /**
   * Move focus into the neighbouring region. Without a configured neighbour in
   * `direction` a loosely related one is used. Empty regions pass the request
   * on to their own neighbour.
   */
  focusRegion(
    currWindow: WrappedWindow | undefined,
    direction: Direction,
    visited: Set<string> = new Set()
  ): boolean {
    visited.add(regionKey(this.ref));

    const adjacent = this.getAdjacent(direction) ?? this.getAlmostAdjacent(direction);
    if (!adjacent || visited.has(regionKey(adjacent))) return false;

    const nextRegion = this.ctx.state.getRegion(adjacent);
    if (!nextRegion) return false;

    if (nextRegion.wrappedWindows.length === 0) {
      return nextRegion.focusRegion(currWindow, direction, visited);
    }

    const target = currWindow
      ? nextRegion.findClosestWindow(currWindow.topLeft())
      : nextRegion.wrappedWindows[0];
    if (!target) return false;

    target.focus();
    currWindow?.unfocus();

    if (this.ctx.config.mouseFollow) {
      this.ctx.host.moveMouse(target.topLeft());
    }
    return true;
  }

  getAdjacent(direction: Direction): RegionRef | undefined {
    return this.adjacent[direction];
  }

  getAlmostAdjacent(direction: Direction): RegionRef | undefined {
    return indexDirectionOf(direction) > 0
      ? this.adjacent.east ?? this.adjacent.south
      : this.adjacent.north ?? this.adjacent.west;
  }

  /** Remove without reconciling, so callers can batch */
  removeWindow(wrappedWindow: WrappedWindow): boolean {
    const index = this.positionIndex.get(wrappedWindow.id);
    if (index === undefined) return false;

    this.wrappedWindows.splice(index, 1);

    const owner = this.ctx.state.regionMap.get(wrappedWindow.id);
    if (owner && sameRegionRef(owner, this.ref)) {
      this.ctx.state.regionMap.delete(wrappedWindow.id);
    }

    this.reindexWindows();
    return true;
  }

  addWindowStart(wrappedWindow: WrappedWindow): void {
    this.insertAt(0, wrappedWindow);
  }

  addWindowBefore(wrappedWindow: WrappedWindow, index: number): void {
    this.insertAt(index, wrappedWindow);
  }

  addWindowAfter(wrappedWindow: WrappedWindow, index: number): void {
    this.insertAt(index + 1, wrappedWindow);
  }

  addWindowEnd(wrappedWindow: WrappedWindow): void {
    this.insertAt(this.wrappedWindows.length, wrappedWindow);
  }

  /** Recompute slots and push each member's frame to the host */
  reconcileWindows(): void {
    if (this.wrappedWindows.length === 0) {
      this.subRegions = [];
      return;
    }

    this.subRegions = this.computeSubRegions(this.ctx.config.margin);

    this.wrappedWindows.forEach((wrappedWindow, index) => {
      const box = this.subRegions[index];
      if (box && !wrappedWindow.updateBox(box)) {
        this.ctx.log.debug('skipped window the host did not resize', {
          region: this.name,
          windowId: wrappedWindow.id,
        });
      }
    });
  }

  /** Slots for the current members, or for `count` members */
  computeSubRegions(margin: number, count = this.wrappedWindows.length): Rectangle[] {
    return getSubRegions({
      box: this.box,
      isVertical: this.isVertical,
      displayId: this.displayId,
      count,
      adjacency: this.adjacent,
      margin,
    });
  }

  reindexWindows(): void {
    const positionIndex = new Map<WindowId, number>();
    this.wrappedWindows.forEach((wrappedWindow, index) => {
      positionIndex.set(wrappedWindow.id, index);
    });
    this.positionIndex = positionIndex;
  }

  private insertAt(index: number, wrappedWindow: WrappedWindow): void {
    const clamped = Math.max(0, Math.min(index, this.wrappedWindows.length));
    this.wrappedWindows.splice(clamped, 0, wrappedWindow);
    this.ctx.state.regionMap.set(wrappedWindow.id, this.ref);
    this.reindexWindows();
  }
}
