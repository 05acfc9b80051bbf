/**
 * Core type definitions for the region layout engine
 */

/** Cardinal direction used for navigation and adjacency */
export type Direction = 'north' | 'south' | 'east' | 'west';

export const DIRECTIONS: readonly Direction[] = ['north', 'south', 'west', 'east'];

/** Directional action a region can perform on one of its windows */
export type LayoutAction = 'move' | 'focus' | 'swap';

/** Which side of a target slot a window lands on */
export type Placement = 'Before' | 'After';

/** Stable host identifier of a window (the host's hash) */
export type WindowId = number;

/** Host-provided screen identifier */
export type DisplayId = string;

export interface Point {
  x: number;
  y: number;
}

/** Screen-space rectangle, top-left origin, y grows downward */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Id-based pointer at a region on some display */
export interface RegionRef {
  displayId: DisplayId;
  regionName: string;
}

/** Static per-direction links to neighbouring regions */
export type Adjacency = Partial<Record<Direction, RegionRef>>;

export function sameRegionRef(a: RegionRef, b: RegionRef): boolean {
  return a.displayId === b.displayId && a.regionName === b.regionName;
}

/** +1 for directions that walk toward the end of a region, -1 otherwise */
export function indexDirectionOf(direction: Direction): 1 | -1 {
  return direction === 'east' || direction === 'south' ? 1 : -1;
}

export function isVerticalDirection(direction: Direction): boolean {
  return direction === 'north' || direction === 'south';
}
