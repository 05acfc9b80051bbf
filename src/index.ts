/**
 * tilewright - region-based tiling layout engine
 */

import { Effect } from "effect"
import type { WindowHost } from "./core/host"
import { bindHostEvents } from "./effect/bridge/host-events-bridge"
import { makeAppRuntime, runEffect } from "./effect/runtime"
import type { AppLayerOptions, AppRuntime } from "./effect/runtime"
import { Keybindings, LayoutManager } from "./effect/services"

export interface Tiler {
  readonly runtime: AppRuntime
  /** Unbind hotkeys and host events, then release the runtime */
  readonly stop: () => Promise<void>
}

/**
 * Build the layout over the host's current windows, bind the hotkeys and
 * start listening for host events.
 */
export async function startTiler(host: WindowHost, options: AppLayerOptions = {}): Promise<Tiler> {
  const runtime = makeAppRuntime(host, options)

  try {
    await runEffect(
      runtime,
      Effect.gen(function* () {
        const manager = yield* LayoutManager
        const keybindings = yield* Keybindings
        yield* manager.init()
        yield* keybindings.register()
      })
    )
  } catch (error) {
    await runtime.dispose()
    throw error
  }

  const unbindEvents = bindHostEvents(runtime, host)

  const stop = async () => {
    unbindEvents()
    await runEffect(
      runtime,
      Effect.flatMap(Keybindings, (keybindings) => keybindings.unregister())
    )
    await runtime.dispose()
  }

  return { runtime, stop }
}

export * as core from "./core"
export type {
  HostEvent,
  HostScreen,
  HostWindow,
  HotkeyHandle,
  KeyValueStore,
  Modifier,
  WindowHost,
} from "./core/host"
export type { Point, Rectangle, RegionRef, WindowId } from "./core/types"
export * from "./effect"
export { MemoryHost, MemoryStore, MemoryWindow } from "./host/memory-host"
export type { MemoryWindowInit } from "./host/memory-host"
