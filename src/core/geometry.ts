/**
 * Geometry helpers - sub-region partitioning, hit-testing and distances
 */

import { DIRECTIONS } from './types';
import type { Adjacency, DisplayId, Placement, Point, Rectangle } from './types';

export interface SubRegionInput {
  box: Rectangle;
  /** Stack top-to-bottom instead of left-to-right */
  isVertical: boolean;
  /** Display owning the box; adjacency on this display narrows the edges */
  displayId: DisplayId;
  count: number;
  adjacency: Adjacency;
  margin: number;
}

/**
 * Split a region box into `count` equal slots along its primary axis.
 *
 * Every slot is inset by half the margin so that neighbouring slots end up one
 * margin apart, then corrected by `offset` for edges shared with other regions
 * on the same display. Slots tile the inset box exactly and span its full
 * cross-axis extent.
 */
export function getSubRegions(input: SubRegionInput): Rectangle[] {
  const { box, isVertical, count, margin } = input;
  if (count <= 0) return [];

  const half = margin / 2;
  const adj = offset(input);
  const subRegions: Rectangle[] = [];

  if (isVertical) {
    const height = (box.height - margin + adj.height) / count;
    for (let i = 0; i < count; i++) {
      subRegions.push({
        x: box.x + half + adj.x,
        y: box.y + half + adj.y + height * i,
        width: box.width - margin + adj.width,
        height,
      });
    }
  } else {
    const width = (box.width - margin + adj.width) / count;
    for (let i = 0; i < count; i++) {
      subRegions.push({
        x: box.x + half + adj.x + width * i,
        y: box.y + half + adj.y,
        width,
        height: box.height - margin + adj.height,
      });
    }
  }

  return subRegions;
}

/**
 * Correction applied to sub-regions for each edge that touches another region
 * on the same display. Directions stack additively.
 */
export function offset(input: SubRegionInput): Rectangle {
  const { count, adjacency, margin, displayId } = input;
  const base = margin / 2;
  const sizeIncr = base / 2;
  const posIncr = count > 0 ? base / count : 0;
  const result: Rectangle = { x: 0, y: 0, width: 0, height: 0 };

  for (const direction of DIRECTIONS) {
    const neighbour = adjacency[direction];
    if (!neighbour || neighbour.displayId !== displayId) continue;

    switch (direction) {
      case 'north':
        result.height += sizeIncr;
        result.y -= posIncr;
        break;
      case 'south':
        result.height += sizeIncr;
        break;
      case 'west':
        result.width += sizeIncr;
        result.x -= posIncr;
        break;
      case 'east':
        result.width += sizeIncr;
        break;
    }
  }

  return result;
}

/**
 * Which half of `box` the point falls in along the stacking axis
 */
export function beforeOrAfter(point: Point, box: Rectangle, isVertical: boolean): Placement {
  if (isVertical) {
    return point.y > box.y + box.height / 2 ? 'After' : 'Before';
  }
  return point.x > box.x + box.width / 2 ? 'After' : 'Before';
}

/**
 * Strict containment; points on the border are outside
 */
export function isPtInBox(point: Point, box: Rectangle): boolean {
  return (
    point.x > box.x &&
    point.x < box.x + box.width &&
    point.y > box.y &&
    point.y < box.y + box.height
  );
}

export function getDistance(a: Point, b: Point): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

/**
 * Whether `origin` sits below the vertical midpoint of `target`, or overhangs
 * it further below than above
 */
export function isBelow(origin: Rectangle, target: Rectangle): boolean {
  const midpoint = target.y + target.height / 2;
  const tail = origin.y + origin.height - midpoint;
  return origin.y > midpoint || tail > midpoint - origin.y;
}

/** Horizontal counterpart of `isBelow` */
export function isAfter(origin: Rectangle, target: Rectangle): boolean {
  const midpoint = target.x + target.width / 2;
  const tail = origin.x + origin.width - midpoint;
  return origin.x > midpoint || tail > midpoint - origin.x;
}

export function topLeftOf(rect: Rectangle): Point {
  return { x: rect.x, y: rect.y };
}
