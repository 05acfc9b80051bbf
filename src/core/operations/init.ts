/**
 * Build the display/region graph from configuration and live windows
 */

import { regionsForDisplay } from '../config';
import type { RegionConfig, RegionLayout } from '../config';
import { Display } from '../display';
import { getSubRegions } from '../geometry';
import type { HostWindow } from '../host';
import type { LayoutContext, LayoutState } from '../layout-state';
import { Region } from '../region';
import type { DisplayId, Rectangle, WindowId } from '../types';
import { WrappedWindow } from '../wrapped-window';

/** Per-region window ids, as persisted between runs */
export interface LayoutSnapshot {
  readonly displays: Readonly<
    Record<
      DisplayId,
      {
        readonly regions: Readonly<
          Record<string, { readonly wrappedWindows: readonly { readonly id: WindowId }[] }>
        >;
      }
    >
  >;
  readonly currentStoreSlot: string | null;
}

/**
 * Split items into `num` consecutive groups of near-equal size. The first
 * `length % num` groups get one extra item.
 */
export function distributeWindows<T>(windows: readonly T[], num: number): T[][] {
  if (num <= 0) return [];

  const distributed: T[][] = [];
  const div = Math.floor(windows.length / num);
  let mod = windows.length % num;
  let start = 0;

  for (let i = 0; i < num; i++) {
    const size = mod > 0 ? div + 1 : div;
    distributed.push(windows.slice(start, start + size));
    start += size;
    if (mod > 0) mod--;
  }

  return distributed;
}

/** Resolve a region's fractional definition against its display */
export function regionBoxFor(displayBox: Rectangle, config: RegionConfig): Rectangle {
  const [startX, startY] = config.startPt;
  return {
    x: startX === 0 ? displayBox.x : Math.trunc(startX * displayBox.width + displayBox.x),
    y: startY === 0 ? displayBox.y : Math.trunc(startY * displayBox.height + displayBox.y),
    width: Math.trunc(displayBox.width * config.width),
    height: Math.trunc(displayBox.height * config.height),
  };
}

/** Live windows named by the stored ids, in stored order */
export function filterWindows(
  windows: readonly HostWindow[],
  stored: readonly { readonly id: WindowId }[]
): HostWindow[] {
  const result: HostWindow[] = [];
  for (const entry of stored) {
    const window = windows.find((w) => w.id === entry.id);
    if (window) result.push(window);
  }
  return result;
}

export function getRegionCount(ctx: LayoutContext, layout: RegionLayout): number {
  return ctx.host
    .screens()
    .reduce((count, screen) => count + Object.keys(regionsForDisplay(layout, screen.id)).length, 0);
}

/**
 * The configured default region, else the first display's default region,
 * else the first region there is
 */
export function findDefaultRegion(state: LayoutState, layout: RegionLayout): Region | undefined {
  if (layout.defaultRegion) {
    const configured = state.getRegion(layout.defaultRegion);
    if (configured) return configured;
  }
  for (const display of state.displays.values()) {
    const region = display.defaultRegion();
    if (region) return region;
  }
  return state.allRegions()[0];
}

/**
 * Populate `ctx.state` with one Display per screen.
 *
 * With `stored` data, each region takes back the still-open windows it held;
 * live windows the data does not mention go to the default region. Without it,
 * open windows are spread evenly across all regions in order.
 */
export function initDisplays(
  ctx: LayoutContext,
  layout: RegionLayout,
  stored?: LayoutSnapshot
): void {
  const { host, state, config } = ctx;
  const screens = host.screens();
  const windows = host.windows().filter((window) => window.isNormal());

  const groups = stored ? [] : distributeWindows(windows, getRegionCount(ctx, layout));
  const claimed = new Set<WindowId>();
  let groupIndex = 0;

  for (const screen of screens) {
    const display = new Display(screen.id, screen.visibleFrame());
    const regionData = stored?.displays[screen.id]?.regions;

    for (const [name, regionConfig] of Object.entries(regionsForDisplay(layout, screen.id))) {
      const box = regionBoxFor(display.box, regionConfig);

      const candidates = stored
        ? filterWindows(windows, regionData?.[name]?.wrappedWindows ?? [])
        : groups[groupIndex++] ?? [];
      const members = candidates.filter((window) => !claimed.has(window.id));

      const subRegions = getSubRegions({
        box,
        isVertical: regionConfig.verticalLayout,
        displayId: display.id,
        count: members.length,
        adjacency: regionConfig.adjacent,
        margin: config.margin,
      });

      const wrappedWindows = members.map(
        (window, index) => new WrappedWindow(window, subRegions[index] ?? box, ctx)
      );

      const region = new Region({
        name,
        displayId: display.id,
        box,
        config: regionConfig,
        wrappedWindows,
        ctx,
      });

      for (const wrappedWindow of wrappedWindows) {
        claimed.add(wrappedWindow.id);
        state.regionMap.set(wrappedWindow.id, region.ref);
      }

      display.addRegion(region);
    }

    state.displays.set(display.id, display);
  }

  const homeless = windows.filter((window) => !claimed.has(window.id));
  if (homeless.length > 0) {
    const fallback = findDefaultRegion(state, layout);
    if (fallback) {
      for (const window of homeless) {
        fallback.addWindowEnd(new WrappedWindow(window, fallback.box, ctx));
      }
      ctx.log.debug('placed untracked windows in default region', {
        region: fallback.name,
        count: homeless.length,
      });
    }
  }

  const focused = host.focusedWindow();
  state.focusedWindowId = focused && state.regionMap.has(focused.id) ? focused.id : null;
  state.currentStoreSlot = stored?.currentStoreSlot ?? null;

  if (config.autoDistribute) {
    for (const display of state.displays.values()) {
      display.distribute();
    }
  }
}
