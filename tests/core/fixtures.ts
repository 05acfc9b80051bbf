/**
 * Shared fixtures for core tests
 */

import { DEFAULT_CONFIG } from '../../src/core/config';
import type { LayoutConfig, RegionConfig, RegionLayout } from '../../src/core/config';
import { LayoutState, silentLogger } from '../../src/core/layout-state';
import type { LayoutContext } from '../../src/core/layout-state';
import type { Region } from '../../src/core/region';
import type { Adjacency } from '../../src/core/types';
import { MemoryHost } from '../../src/host/memory-host';
import type { MemoryWindow } from '../../src/host/memory-host';

export interface TestContext extends LayoutContext {
  readonly host: MemoryHost;
}

export function makeContext(
  config: Partial<LayoutConfig> = {},
  host: MemoryHost = new MemoryHost()
): TestContext {
  return {
    host,
    config: { ...DEFAULT_CONFIG, margin: 0, ...config },
    state: new LayoutState(),
    log: silentLogger,
  };
}

export function regionConfig(
  startPt: [number, number],
  width: number,
  height: number,
  options: { adjacent?: Adjacency; verticalLayout?: boolean; isDefault?: boolean } = {}
): RegionConfig {
  return {
    startPt,
    width,
    height,
    adjacent: options.adjacent ?? {},
    verticalLayout: options.verticalLayout ?? false,
    isDefault: options.isDefault ?? false,
  };
}

/**
 * Display "d1" at 1000x800: a vertical "left" half (the default region) and a
 * horizontal "right" half.
 */
export const twoRegionLayout: RegionLayout = {
  displays: {
    d1: {
      left: regionConfig([0, 0], 0.5, 1, {
        verticalLayout: true,
        isDefault: true,
        adjacent: { east: { displayId: 'd1', regionName: 'right' } },
      }),
      right: regionConfig([0.5, 0], 0.5, 1, {
        adjacent: { west: { displayId: 'd1', regionName: 'left' } },
      }),
    },
  },
};

/** Host with display d1 and windows 1..count, all at the origin */
export function hostWithWindows(count: number): { host: MemoryHost; windows: MemoryWindow[] } {
  const host = new MemoryHost();
  host.addScreen('d1', { x: 0, y: 0, width: 1000, height: 800 });
  const windows: MemoryWindow[] = [];
  for (let id = 1; id <= count; id++) {
    windows.push(host.addWindow({ id, frame: { x: 0, y: 0, width: 100, height: 100 } }));
  }
  return { host, windows };
}

export function regionNamed(ctx: LayoutContext, displayId: string, name: string): Region {
  const region = ctx.state.getRegion({ displayId, regionName: name });
  if (!region) throw new Error(`missing region ${displayId}/${name}`);
  return region;
}

export function windowIds(region: Region): number[] {
  return region.wrappedWindows.map((wrappedWindow) => wrappedWindow.id);
}
