/**
 * WrappedWindow - a host window plus the box its region assigned to it
 */

import type { HostWindow } from './host';
import type { LayoutContext } from './layout-state';
import type { Point, Rectangle, WindowId } from './types';

export class WrappedWindow {
  readonly id: WindowId;

  /** Slot assigned by the owning region, before margin or growth */
  box: Rectangle;

  constructor(
    readonly window: HostWindow,
    box: Rectangle,
    private readonly ctx: LayoutContext
  ) {
    this.id = window.id;
    this.box = { ...box };
  }

  /**
   * Focus the window and keep asking until the host reports it focused.
   * Hosts sometimes hand focus straight to another window after a request.
   *
   * @returns whether focus was confirmed
   */
  focus(): boolean {
    const { config, state, log } = this.ctx;

    let attempts = 0;
    while (!this.isFocused()) {
      if (attempts >= config.focusRetryLimit) {
        log.warn('focus not confirmed by host', { windowId: this.id, attempts });
        return false;
      }
      this.window.focus();
      attempts++;
    }

    if (config.growActiveWindow) {
      this.apply(this.withFat());
    }

    state.focusedWindowId = this.id;
    log.debug('focused window', { windowId: this.id, attempts });
    return true;
  }

  /** Drop any focus growth */
  unfocus(): void {
    this.apply(this.withMargin());
  }

  isFocused(): boolean {
    return this.ctx.host.focusedWindow()?.id === this.id;
  }

  /** Replace the slot and immediately push the matching frame to the host */
  updateBox(box: Rectangle): boolean {
    this.box = { ...box };
    const grown = this.ctx.config.growActiveWindow && this.isFocused();
    return this.apply(grown ? this.withFat() : this.withMargin());
  }

  /** Slot grown by 1/16 of the margin on every side */
  withFat(): Rectangle {
    const { margin } = this.ctx.config;
    const { x, y, width, height } = this.box;
    return {
      x: x - margin / 16,
      y: y - margin / 16,
      width: width + margin / 8,
      height: height + margin / 8,
    };
  }

  /** Slot shrunk by half the margin on every side */
  withMargin(): Rectangle {
    const { margin } = this.ctx.config;
    const { x, y, width, height } = this.box;
    return {
      x: x + margin / 2,
      y: y + margin / 2,
      width: width - margin,
      height: height - margin,
    };
  }

  topLeft(): Point {
    return this.window.topLeft();
  }

  frame(): Rectangle {
    return this.window.frame();
  }

  title(): string {
    return this.window.title();
  }

  appName(): string {
    return this.window.appName();
  }

  /**
   * Push a frame to the host. A closed window makes this a no-op; the close
   * event is what removes it from its region.
   */
  private apply(frame: Rectangle): boolean {
    try {
      const accepted = this.window.setFrame(frame);
      if (!accepted) {
        this.ctx.log.debug('host rejected frame', { windowId: this.id });
      }
      return accepted;
    } catch (error) {
      this.ctx.log.warn('setting window frame failed', { windowId: this.id, error: String(error) });
      return false;
    }
  }
}
