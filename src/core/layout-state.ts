/**
 * Process-wide layout state: displays, the window -> region index and focus.
 *
 * Only Region mutates `regionMap`; the orchestrator replaces the whole state on
 * init and restore.
 */

import type { Display } from './display';
import type { Region } from './region';
import type { LayoutConfig } from './config';
import type { WindowHost } from './host';
import type { DisplayId, RegionRef, WindowId } from './types';

export interface CoreLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
}

export const silentLogger: CoreLogger = {
  debug: () => {},
  warn: () => {},
};

export class LayoutState {
  readonly displays = new Map<DisplayId, Display>();
  readonly regionMap = new Map<WindowId, RegionRef>();
  focusedWindowId: WindowId | null = null;
  currentStoreSlot: string | null = null;

  getRegion(ref: RegionRef): Region | undefined {
    return this.displays.get(ref.displayId)?.regions.get(ref.regionName);
  }

  regionOf(windowId: WindowId): Region | undefined {
    const ref = this.regionMap.get(windowId);
    return ref ? this.getRegion(ref) : undefined;
  }

  /** All regions, display by display in insertion order */
  allRegions(): Region[] {
    const regions: Region[] = [];
    for (const display of this.displays.values()) {
      regions.push(...display.regions.values());
    }
    return regions;
  }

  trackedWindowCount(): number {
    return this.allRegions().reduce((sum, region) => sum + region.wrappedWindows.length, 0);
  }
}

/** Everything a region or window needs from outside itself */
export interface LayoutContext {
  readonly host: WindowHost;
  readonly config: LayoutConfig;
  readonly state: LayoutState;
  readonly log: CoreLogger;
}
