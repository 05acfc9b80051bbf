/**
 * In-process window host.
 *
 * Backs `Host.testLayer` and the test suite: screens, windows, focus, hotkeys,
 * storage and events all live in plain maps.
 */

import type {
  HostEvent,
  HostScreen,
  HostWindow,
  HotkeyHandle,
  KeyValueStore,
  Modifier,
  WindowHost,
} from '../core/host';
import type { DisplayId, Point, Rectangle, WindowId } from '../core/types';

export interface MemoryWindowInit {
  id: WindowId;
  frame: Rectangle;
  title?: string;
  app?: string;
  normal?: boolean;
}

export class MemoryWindow implements HostWindow {
  private currentFrame: Rectangle;
  closed = false;
  readonly frameHistory: Rectangle[] = [];
  focusRequests = 0;

  constructor(
    private readonly host: MemoryHost,
    private readonly init: MemoryWindowInit
  ) {
    this.currentFrame = { ...init.frame };
  }

  get id(): WindowId {
    return this.init.id;
  }

  title(): string {
    return this.init.title ?? `window-${this.init.id}`;
  }

  appName(): string {
    return this.init.app ?? 'app';
  }

  frame(): Rectangle {
    return { ...this.currentFrame };
  }

  topLeft(): Point {
    return { x: this.currentFrame.x, y: this.currentFrame.y };
  }

  setFrame(frame: Rectangle): boolean {
    if (this.closed) return false;
    this.currentFrame = { ...frame };
    this.frameHistory.push({ ...frame });
    return true;
  }

  focus(): boolean {
    this.focusRequests++;
    return this.host.requestFocus(this);
  }

  isNormal(): boolean {
    return this.init.normal ?? true;
  }
}

class MemoryHotkey implements HotkeyHandle {
  private enabled = true;

  constructor(
    readonly key: string,
    readonly modifiers: readonly Modifier[],
    readonly handler: () => void
  ) {}

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}

export class MemoryStore implements KeyValueStore {
  readonly entries = new Map<string, string>();

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }
}

const comboKey = (key: string, modifiers: readonly Modifier[]): string =>
  Array.from<string>(modifiers).sort().concat(key).join('+');

export class MemoryHost implements WindowHost {
  readonly storage = new MemoryStore();
  readonly mouseMoves: Point[] = [];

  private readonly screenList: HostScreen[] = [];
  private readonly windowList: MemoryWindow[] = [];
  private readonly hotkeys = new Map<string, MemoryHotkey>();
  private readonly listeners = new Set<(event: HostEvent) => void>();
  private focused: MemoryWindow | null = null;

  /** Number of upcoming focus requests the host will ignore */
  focusStealCount = 0;

  addScreen(id: DisplayId, frame: Rectangle): HostScreen {
    const screen: HostScreen = { id, visibleFrame: () => ({ ...frame }) };
    this.screenList.push(screen);
    return screen;
  }

  addWindow(init: MemoryWindowInit): MemoryWindow {
    const window = new MemoryWindow(this, init);
    this.windowList.push(window);
    return window;
  }

  closeWindow(window: MemoryWindow): void {
    window.closed = true;
    const index = this.windowList.indexOf(window);
    if (index >= 0) this.windowList.splice(index, 1);
    if (this.focused === window) this.focused = null;
  }

  /** Set focus directly, as a mouse click would */
  setFocused(window: MemoryWindow | null): void {
    this.focused = window;
  }

  requestFocus(window: MemoryWindow): boolean {
    if (window.closed) return false;
    if (this.focusStealCount > 0) {
      this.focusStealCount--;
      return true;
    }
    this.focused = window;
    return true;
  }

  screens(): HostScreen[] {
    return [...this.screenList];
  }

  windows(): HostWindow[] {
    return [...this.windowList];
  }

  focusedWindow(): HostWindow | null {
    return this.focused;
  }

  moveMouse(point: Point): void {
    this.mouseMoves.push({ ...point });
  }

  bindKey(key: string, modifiers: readonly Modifier[], handler: () => void): HotkeyHandle {
    const hotkey = new MemoryHotkey(key, modifiers, handler);
    this.hotkeys.set(comboKey(key, modifiers), hotkey);
    return hotkey;
  }

  /**
   * Simulate a key press
   *
   * @returns whether an enabled binding handled it
   */
  pressKey(key: string, modifiers: readonly Modifier[]): boolean {
    const hotkey = this.hotkeys.get(comboKey(key, modifiers));
    if (!hotkey || !hotkey.isEnabled()) return false;
    hotkey.handler();
    return true;
  }

  hotkeyCount(): number {
    return this.hotkeys.size;
  }

  subscribe(listener: (event: HostEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: HostEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}
