/**
 * Display - one physical screen and its configured regions
 */

import type { Region } from './region';
import type { DisplayId, Rectangle } from './types';

export class Display {
  /** Region name -> region. Membership is fixed by configuration */
  readonly regions = new Map<string, Region>();

  constructor(
    readonly id: DisplayId,
    readonly box: Rectangle
  ) {}

  addRegion(region: Region): void {
    this.regions.set(region.name, region);
  }

  /** Reconcile every region on this display */
  distribute(): void {
    for (const region of this.regions.values()) {
      region.reconcileWindows();
    }
  }

  defaultRegion(): Region | undefined {
    for (const region of this.regions.values()) {
      if (region.isDefault) return region;
    }
    return undefined;
  }
}
