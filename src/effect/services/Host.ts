/**
 * Host service - the window manager the layout engine drives
 */
import { Context, Layer } from "effect"
import type { WindowHost } from "../../core/host"
import { MemoryHost } from "../../host/memory-host"

export class Host extends Context.Tag("@tilewright/Host")<Host, WindowHost>() {
  /** Layer over a concrete host implementation */
  static readonly layer = (host: WindowHost) => Layer.succeed(Host, host)

  /** Test layer - fresh in-memory host with no screens or windows */
  static readonly testLayer = Layer.sync(Host, () => new MemoryHost())
}
