/**
 * Tests for Keybindings service.
 */
import { Effect, Layer } from "effect"
import { describe, expect, it } from "@effect/vitest"
import type { LayoutState } from "../../../src/core/layout-state"
import type { MemoryHost } from "../../../src/host/memory-host"
import { AppConfig } from "../../../src/effect/Config"
import { Host } from "../../../src/effect/services/Host"
import { Keybindings } from "../../../src/effect/services/Keybindings"
import { LayoutManager } from "../../../src/effect/services/LayoutManager"
import { LayoutStorage } from "../../../src/effect/services/LayoutStorage"
import { hostWithWindows, twoRegionLayout } from "../../core/fixtures"

const keybindingsLayer = (host: MemoryHost) => {
  const hostLayer = Host.layer(host)
  const managerLayer = LayoutManager.layer.pipe(
    Layer.provide(LayoutStorage.layer),
    Layer.provide(
      Layer.mergeAll(
        hostLayer,
        AppConfig.testLayer({ layout: { margin: 0 }, regions: twoRegionLayout })
      )
    )
  )
  return Keybindings.layer.pipe(Layer.provideMerge(Layer.mergeAll(managerLayer, hostLayer)))
}

const idsIn = (state: LayoutState, regionName: string) =>
  state.getRegion({ displayId: "d1", regionName })?.wrappedWindows.map((w) => w.id)

const setup = Effect.gen(function* () {
  const manager = yield* LayoutManager
  const keybindings = yield* Keybindings
  yield* manager.init()
  yield* keybindings.register()
  return { manager, keybindings }
})

describe("Keybindings", () => {
  it.effect("binds directions, slots and mode keys", () => {
    const { host } = hostWithWindows(3)
    return Effect.gen(function* () {
      yield* setup
      expect(host.hotkeyCount()).toBe(45)
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })

  it.effect("routes hjkl chords to layout actions", () => {
    const { host, windows } = hostWithWindows(3)
    return Effect.gen(function* () {
      const { manager } = yield* setup
      host.setFocused(windows[0] ?? null)

      expect(host.pressKey("l", ["ctrl", "alt"])).toBe(true)
      expect(host.focusedWindow()?.id).toBe(3)

      host.setFocused(windows[0] ?? null)
      host.pressKey("l", ["cmd", "ctrl"])
      const state = yield* manager.getState()
      expect(idsIn(state, "right")).toEqual([1, 3])
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })

  it.effect("toggles passthrough mode", () => {
    const { host } = hostWithWindows(3)
    return Effect.gen(function* () {
      const { keybindings } = yield* setup

      host.pressKey("r", ["cmd", "ctrl"])
      expect(yield* keybindings.isDirectionalEnabled()).toBe(false)
      expect(host.pressKey("h", ["ctrl", "alt"])).toBe(false)

      expect(host.pressKey("escape", ["cmd"])).toBe(true)
      expect(yield* keybindings.isDirectionalEnabled()).toBe(true)
      expect(host.pressKey("h", ["ctrl", "alt"])).toBe(true)
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })

  it.effect("stores, restores and clears slots", () => {
    const { host, windows } = hostWithWindows(3)
    return Effect.gen(function* () {
      const { manager } = yield* setup

      host.pressKey("4", ["alt", "ctrl"])
      expect(host.storage.get("tilewright.layout.4")).toBeDefined()

      host.setFocused(windows[0] ?? null)
      yield* manager.doAction("move", "east")
      host.pressKey("4", ["cmd", "ctrl"])
      const state = yield* manager.getState()
      expect(idsIn(state, "left")).toEqual([1, 2])

      host.pressKey("4", ["alt", "ctrl", "cmd"])
      expect(host.storage.get("tilewright.layout.4")).toBeUndefined()
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })

  it.effect("keeps storage failures inside the handler", () => {
    const { host } = hostWithWindows(3)
    return Effect.gen(function* () {
      yield* setup
      host.storage.set = () => {
        throw new Error("disk full")
      }

      expect(host.pressKey("5", ["alt", "ctrl"])).toBe(true)
      expect(host.storage.get("tilewright.layout.5")).toBeUndefined()
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })

  it.effect("disables everything on unregister", () => {
    const { host } = hostWithWindows(3)
    return Effect.gen(function* () {
      const { keybindings } = yield* setup
      yield* keybindings.unregister()

      expect(host.pressKey("h", ["ctrl", "alt"])).toBe(false)
      expect(host.pressKey("1", ["alt", "ctrl"])).toBe(false)
      expect(host.pressKey("c", ["cmd", "ctrl"])).toBe(false)
    }).pipe(Effect.provide(keybindingsLayer(host)))
  })
})
