/**
 * Configuration for tilewright layout behaviour
 */

import type { Adjacency, DisplayId, RegionRef } from './types';

export interface LayoutConfig {
  /** Margin between windows and between regions, in pixels */
  margin: number;

  /** Enlarge the focused window slightly past its slot */
  growActiveWindow: boolean;

  /** Warp the mouse pointer to a newly focused window */
  mouseFollow: boolean;

  /** Reconcile every region right after init */
  autoDistribute: boolean;

  /** Restore the default (then last used) slot when init gets no data */
  autoRestore: boolean;

  /** Slot used for autosave */
  defaultStoreSlot: string;
  defaultAutoSave: boolean;
  currentAutoSave: boolean;

  /** Quiet period before a drag burst is acted on */
  dragDebounceMs: number;

  /** Upper bound on focus confirmation attempts */
  focusRetryLimit: number;
}

export const DEFAULT_CONFIG: LayoutConfig = {
  margin: 30,
  growActiveWindow: true,
  mouseFollow: false,
  autoDistribute: true,
  autoRestore: true,
  defaultStoreSlot: '0',
  defaultAutoSave: true,
  currentAutoSave: false,
  dragDebounceMs: 250,
  focusRetryLimit: 25,
};

/** Region definition, sized in fractions of its display's visible frame */
export interface RegionConfig {
  startPt: readonly [number, number];
  width: number;
  height: number;
  adjacent: Adjacency;
  verticalLayout: boolean;
  isDefault: boolean;
}

export type DisplayRegionConfig = Record<string, RegionConfig>;

export interface RegionLayout {
  displays: Record<DisplayId, DisplayRegionConfig>;
  /** Home for windows that open without a region */
  defaultRegion?: RegionRef;
}

export const FALLBACK_REGION_NAME = 'main';

/** Used for displays the layout does not mention */
export const FALLBACK_REGION: RegionConfig = {
  startPt: [0, 0],
  width: 1,
  height: 1,
  adjacent: {},
  verticalLayout: false,
  isDefault: true,
};

export function regionsForDisplay(layout: RegionLayout, displayId: DisplayId): DisplayRegionConfig {
  const configured = layout.displays[displayId];
  if (configured && Object.keys(configured).length > 0) return configured;
  return { [FALLBACK_REGION_NAME]: FALLBACK_REGION };
}

/** Slots bound to keys; slot '0' doubles as the autosave slot */
export const SAVE_SLOTS: readonly string[] = Array.from('1234567890');
