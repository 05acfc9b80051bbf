/**
 * LayoutManager service
 * Owns the layout state and exposes the operations host events and
 * keybindings call into.
 */
import { Context, Effect, Layer, Ref, Runtime, Schema } from "effect"
import { SAVE_SLOTS } from "../../core/config"
import type { RegionLayout } from "../../core/config"
import type { HostWindow } from "../../core/host"
import { LayoutState } from "../../core/layout-state"
import type { LayoutContext } from "../../core/layout-state"
import { doAction as runAction, snapshotState } from "../../core/operations/actions"
import {
  addNewWindow,
  dropWindowAt,
  removeClosedWindow,
  syncFocusAfterClick,
} from "../../core/operations/events"
import { findRegionPosition as findPosition, findWindow as findTracked } from "../../core/operations/find"
import type { FoundWindow, RegionPosition } from "../../core/operations/find"
import { initDisplays } from "../../core/operations/init"
import { createDebouncer } from "../../core/scheduling"
import type { Point } from "../../core/types"
import { AppConfig } from "../Config"
import type { LayoutStorageError } from "../errors"
import { makeCoreLogger } from "../logging"
import { SerializedLayout } from "../models"
import { StoreSlot as StoreSlotSchema, makeStoreSlot } from "../types"
import type { Direction, LayoutAction, StoreSlot } from "../types"
import { Host } from "./Host"
import { LayoutStorage } from "./LayoutStorage"

const isStoreSlot = Schema.is(StoreSlotSchema)

// =============================================================================
// Service Definition
// =============================================================================

export class LayoutManager extends Context.Tag("@tilewright/LayoutManager")<
  LayoutManager,
  {
    /**
     * Build the display/region graph. Without data, and with auto-restore on,
     * the default slot (then the slot it last pointed at) is tried first.
     */
    readonly init: (stored?: SerializedLayout) => Effect.Effect<void>

    /** Move, focus or swap the focused window */
    readonly doAction: (
      action: LayoutAction,
      direction: Direction
    ) => Effect.Effect<boolean>

    /** Wrapper and region of a host window, or null if untracked */
    readonly findWindow: (window: HostWindow | null) => Effect.Effect<FoundWindow | null>

    /** Region slot under a point, or null */
    readonly findRegionPosition: (point: Point) => Effect.Effect<RegionPosition | null>

    // =========================================================================
    // Host Events
    // =========================================================================

    readonly windowOpened: (window: HostWindow) => Effect.Effect<void>
    readonly windowClosed: (window: HostWindow) => Effect.Effect<void>
    readonly mouseClick: (point: Point) => Effect.Effect<void>

    /** Feed one drag sample; the drop runs after the quiet period */
    readonly dragSample: (point: Point) => Effect.Effect<void>

    /** Drop the focused window at a point right away */
    readonly dropAt: (point: Point) => Effect.Effect<boolean>

    readonly isDragging: () => Effect.Effect<boolean>

    // =========================================================================
    // Persistence
    // =========================================================================

    readonly snapshot: () => Effect.Effect<SerializedLayout>

    /** Save to a slot and make it the current slot */
    readonly saveSlot: (slot: StoreSlot) => Effect.Effect<void, LayoutStorageError>

    /** Re-init from a slot */
    readonly restoreSlot: (slot: StoreSlot) => Effect.Effect<void>

    readonly clearSlot: (slot: StoreSlot) => Effect.Effect<void, LayoutStorageError>
    readonly clearAllSlots: () => Effect.Effect<void, LayoutStorageError>

    /** Save the default slot, and the current one when configured to */
    readonly autosave: () => Effect.Effect<void>

    /** Current state, for inspection */
    readonly getState: () => Effect.Effect<LayoutState>
  }
>() {
  static readonly layer = Layer.scoped(
    LayoutManager,
    Effect.gen(function* () {
      const host = yield* Host
      const storage = yield* LayoutStorage
      const { layout: config, regions, logLevel } = yield* AppConfig
      const runtime = yield* Effect.runtime<never>()
      const runSync = Runtime.runSync(runtime)

      const log = makeCoreLogger(runtime, logLevel)
      const layout: RegionLayout = regions
      const defaultSlot = makeStoreSlot(config.defaultStoreSlot)

      const makeContext = (): LayoutContext => ({
        host,
        config,
        state: new LayoutState(),
        log,
      })

      const contextRef = yield* Ref.make<LayoutContext>(makeContext())
      const draggingRef = yield* Ref.make(false)

      const withContext = <A>(f: (ctx: LayoutContext) => A) =>
        Effect.map(Ref.get(contextRef), f)

      // Slot loading never fails init; missing or bad data means "no data"
      const loadOptional = (slot: StoreSlot) =>
        storage.load(slot).pipe(
          Effect.map((data): SerializedLayout | undefined => data),
          Effect.catchTags({
            SlotNotFoundError: () => Effect.succeed(undefined),
            LayoutCorruptedError: (error) =>
              Effect.logWarning("ignoring corrupted layout slot", error).pipe(
                Effect.as(undefined)
              ),
            LayoutStorageError: (error) =>
              Effect.logWarning("layout slot unreadable", error).pipe(Effect.as(undefined)),
          })
        )

      const init = Effect.fn("LayoutManager.init")(function* (stored?: SerializedLayout) {
        let data = stored

        if (!data && config.autoRestore) {
          const defaultData = yield* loadOptional(defaultSlot)
          const lastSlot = defaultData?.currentStoreSlot
          const lastData =
            isStoreSlot(lastSlot) && lastSlot !== defaultSlot
              ? yield* loadOptional(lastSlot)
              : undefined
          data = lastData ?? defaultData
        }

        const ctx = makeContext()
        initDisplays(ctx, layout, data)
        yield* Ref.set(contextRef, ctx)

        yield* Effect.logInfo("layout initialised").pipe(
          Effect.annotateLogs({
            displays: ctx.state.displays.size,
            windows: ctx.state.trackedWindowCount(),
            restored: data !== undefined,
          })
        )
      })

      const doAction = Effect.fn("LayoutManager.doAction")(function* (
        action: LayoutAction,
        direction: Direction
      ) {
        const changed = yield* withContext((ctx) => runAction(ctx, layout, action, direction))
        yield* Effect.logDebug("action").pipe(
          Effect.annotateLogs({ action, direction, changed })
        )
        return changed
      })

      const findWindow = (window: HostWindow | null) =>
        withContext((ctx) => findTracked(ctx.state, window))

      const findRegionPosition = (point: Point) =>
        withContext((ctx) => findPosition(ctx.state, point))

      const snapshot = Effect.fn("LayoutManager.snapshot")(function* () {
        const ctx = yield* Ref.get(contextRef)
        return yield* Schema.decodeUnknown(SerializedLayout)(snapshotState(ctx.state)).pipe(
          Effect.orDie
        )
      })

      const persist = (slot: StoreSlot) =>
        Effect.flatMap(snapshot(), (data) => storage.save(slot, data))

      const autosave = () =>
        Effect.gen(function* () {
          const ctx = yield* Ref.get(contextRef)
          const currentSlot = ctx.state.currentStoreSlot

          if (config.defaultAutoSave) {
            yield* persist(defaultSlot)
          }
          if (config.currentAutoSave && isStoreSlot(currentSlot) && currentSlot !== defaultSlot) {
            yield* persist(currentSlot)
          }
        }).pipe(
          Effect.catchAll((error) => Effect.logWarning("autosave failed", error)),
          Effect.withSpan("LayoutManager.autosave")
        )

      const windowOpened = Effect.fn("LayoutManager.windowOpened")(function* (
        window: HostWindow
      ) {
        const region = yield* withContext((ctx) => addNewWindow(ctx, layout, window))
        if (!region) return
        yield* Effect.logDebug("window opened").pipe(
          Effect.annotateLogs({ windowId: window.id, region: region.name })
        )
        yield* autosave()
      })

      const windowClosed = Effect.fn("LayoutManager.windowClosed")(function* (
        window: HostWindow
      ) {
        const region = yield* withContext((ctx) => removeClosedWindow(ctx, window))
        if (!region) return
        yield* Effect.logDebug("window closed").pipe(
          Effect.annotateLogs({ windowId: window.id, region: region.name })
        )
        yield* autosave()
      })

      const mouseClick = Effect.fn("LayoutManager.mouseClick")(function* (_point: Point) {
        yield* withContext(syncFocusAfterClick)
        yield* Ref.set(draggingRef, false)
      })

      const dropAt = Effect.fn("LayoutManager.dropAt")(function* (point: Point) {
        const moved = yield* withContext((ctx) => dropWindowAt(ctx, point))
        yield* Effect.logDebug("drop").pipe(Effect.annotateLogs({ ...point, moved }))
        return moved
      })

      const debouncer = createDebouncer<Point>({
        delayMs: config.dragDebounceMs,
        onBurstStart: () => runSync(Ref.set(draggingRef, true)),
        run: (point) =>
          runSync(
            dropAt(point).pipe(
              Effect.catchAllCause((cause) => Effect.logError("drop failed", cause))
            )
          ),
      })

      yield* Effect.addFinalizer(() => Effect.sync(() => debouncer.cancel()))

      const dragSample = Effect.fn("LayoutManager.dragSample")(function* (point: Point) {
        yield* Effect.sync(() => debouncer.push(point))
      })

      const saveSlot = Effect.fn("LayoutManager.saveSlot")(function* (slot: StoreSlot) {
        const ctx = yield* Ref.get(contextRef)
        ctx.state.currentStoreSlot = slot
        yield* persist(slot)
      })

      const restoreSlot = Effect.fn("LayoutManager.restoreSlot")(function* (slot: StoreSlot) {
        const data = yield* loadOptional(slot)
        if (!data) {
          yield* Effect.logInfo("slot empty, reinitialising").pipe(Effect.annotateLogs({ slot }))
        }
        yield* init(data)
        if (data) {
          const ctx = yield* Ref.get(contextRef)
          ctx.state.currentStoreSlot = slot
        }
      })

      const clearSlot = Effect.fn("LayoutManager.clearSlot")(function* (slot: StoreSlot) {
        yield* storage.remove(slot)
        const ctx = yield* Ref.get(contextRef)
        if (ctx.state.currentStoreSlot === slot) {
          ctx.state.currentStoreSlot = null
        }
      })

      const clearAllSlots = Effect.fn("LayoutManager.clearAllSlots")(function* () {
        yield* storage.clear(SAVE_SLOTS.map(makeStoreSlot))
        const ctx = yield* Ref.get(contextRef)
        ctx.state.currentStoreSlot = null
      })

      return LayoutManager.of({
        init,
        doAction,
        findWindow,
        findRegionPosition,
        windowOpened,
        windowClosed,
        mouseClick,
        dragSample,
        dropAt,
        isDragging: () => Ref.get(draggingRef),
        snapshot,
        saveSlot,
        restoreSlot,
        clearSlot,
        clearAllSlots,
        autosave,
        getState: () => Effect.map(Ref.get(contextRef), (ctx) => ctx.state),
      })
    })
  )
}
