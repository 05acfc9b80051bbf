/**
 * Tests for the host events bridge.
 */
import { ConfigProvider, Effect } from "effect"
import { afterEach, describe, expect, it, vi } from "vitest"
import { bindHostEvents } from "../../../src/effect/bridge/host-events-bridge"
import { makeAppRuntime } from "../../../src/effect/runtime"
import type { AppRuntime } from "../../../src/effect/runtime"
import { LayoutManager } from "../../../src/effect/services"
import { hostWithWindows } from "../../core/fixtures"

const configProvider = ConfigProvider.fromMap(
  new Map([
    ["TILER_MARGIN", "0"],
    ["TILER_DRAG_DEBOUNCE_MS", "10"],
  ])
)

const mainIds = (runtime: AppRuntime) =>
  runtime.runPromise(
    Effect.map(Effect.flatMap(LayoutManager, (manager) => manager.getState()), (state) =>
      state.getRegion({ displayId: "d1", regionName: "main" })?.wrappedWindows.map((w) => w.id)
    )
  )

describe("bindHostEvents", () => {
  let runtime: AppRuntime | undefined
  let unbindEvents: (() => void) | undefined

  afterEach(async () => {
    unbindEvents?.()
    await runtime?.dispose()
    runtime = undefined
    unbindEvents = undefined
  })

  const start = async (count: number) => {
    const fixture = hostWithWindows(count)
    const appRuntime = makeAppRuntime(fixture.host, { configProvider })
    runtime = appRuntime
    await appRuntime.runPromise(Effect.flatMap(LayoutManager, (manager) => manager.init()))
    const unbind = bindHostEvents(appRuntime, fixture.host)
    unbindEvents = unbind
    return { ...fixture, runtime: appRuntime, unbind }
  }

  it("subscribes before returning", async () => {
    const { host, unbind } = await start(1)

    expect(host.listenerCount()).toBe(1)
    unbind()
    expect(host.listenerCount()).toBe(0)
  })

  it("tracks opened and closed windows in order", async () => {
    const { host, windows, runtime: app } = await start(2)
    const opened = host.addWindow({ id: 3, frame: { x: 0, y: 0, width: 10, height: 10 } })
    const [first] = windows

    host.emit({ type: "windowOpened", window: opened })
    host.closeWindow(first)
    host.emit({ type: "windowClosed", window: first })

    await vi.waitFor(async () => {
      expect(await mainIds(app)).toEqual([2, 3])
    })
  })

  it("drops a dragged window once the pointer settles", async () => {
    const { host, windows, runtime: app } = await start(2)
    host.setFocused(windows[0] ?? null)

    host.emit({ type: "mouseDrag", point: { x: 900, y: 100 } })

    await vi.waitFor(async () => {
      expect(await mainIds(app)).toEqual([2, 1])
    })
  })
})
