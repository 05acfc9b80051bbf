/**
 * Host window-manager surface consumed by the layout engine.
 *
 * The engine never talks to a concrete windowing platform; everything it needs
 * from the outside world goes through these interfaces.
 */

import type { DisplayId, Point, Rectangle, WindowId } from './types';

export interface HostWindow {
  readonly id: WindowId;
  title(): string;
  appName(): string;
  frame(): Rectangle;
  topLeft(): Point;
  /** Returns false when the host rejects the change (e.g. window already closed) */
  setFrame(frame: Rectangle): boolean;
  /** Request focus. Confirmation must be read back through `focusedWindow()` */
  focus(): boolean;
  /** Whether this is a regular, user-facing window */
  isNormal(): boolean;
}

export interface HostScreen {
  readonly id: DisplayId;
  /** Usable area in top-left-origin coordinates */
  visibleFrame(): Rectangle;
}

export type Modifier = 'cmd' | 'ctrl' | 'alt' | 'shift';

export interface HotkeyHandle {
  enable(): void;
  disable(): void;
  isEnabled(): boolean;
}

export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  remove(key: string): void;
}

export type HostEvent =
  | { type: 'windowOpened'; window: HostWindow }
  | { type: 'windowClosed'; window: HostWindow }
  | { type: 'mouseClick'; point: Point }
  | { type: 'mouseDrag'; point: Point };

export interface WindowHost {
  screens(): HostScreen[];
  /** Currently open, visible windows */
  windows(): HostWindow[];
  focusedWindow(): HostWindow | null;
  moveMouse(point: Point): void;
  bindKey(key: string, modifiers: readonly Modifier[], handler: () => void): HotkeyHandle;
  /** Events are delivered one at a time on the host's event loop */
  subscribe(listener: (event: HostEvent) => void): () => void;
  readonly storage: KeyValueStore;
}
