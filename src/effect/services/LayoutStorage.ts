/**
 * Layout storage service for persisting region membership in host storage.
 */
import { Context, Effect, Layer, Schema } from "effect"
import type { KeyValueStore } from "../../core/host"
import { MemoryStore } from "../../host/memory-host"
import { LayoutCorruptedError, LayoutStorageError, SlotNotFoundError } from "../errors"
import { SerializedLayoutJson } from "../models"
import type { SerializedLayout } from "../models"
import type { StoreSlot } from "../types"
import { Host } from "./Host"

const slotKey = (slot: StoreSlot) => `tilewright.layout.${slot}`

// =============================================================================
// LayoutStorage Service
// =============================================================================

export class LayoutStorage extends Context.Tag("@tilewright/LayoutStorage")<
  LayoutStorage,
  {
    /** Save a layout into a slot, replacing what was there */
    readonly save: (
      slot: StoreSlot,
      layout: SerializedLayout
    ) => Effect.Effect<void, LayoutStorageError>

    /** Load the layout stored in a slot */
    readonly load: (
      slot: StoreSlot
    ) => Effect.Effect<
      SerializedLayout,
      SlotNotFoundError | LayoutCorruptedError | LayoutStorageError
    >

    /** Delete a slot */
    readonly remove: (slot: StoreSlot) => Effect.Effect<void, LayoutStorageError>

    /** Delete several slots */
    readonly clear: (slots: readonly StoreSlot[]) => Effect.Effect<void, LayoutStorageError>

    /** Check if a slot holds anything */
    readonly exists: (slot: StoreSlot) => Effect.Effect<boolean, LayoutStorageError>
  }
>() {
  /** Build the service over any key/value store */
  static readonly make = (store: KeyValueStore) => {
    const read = (slot: StoreSlot) =>
      Effect.try({
        try: () => store.get(slotKey(slot)),
        catch: (cause) => new LayoutStorageError({ operation: "load", slot, cause }),
      })

    const save = Effect.fn("LayoutStorage.save")(function* (
      slot: StoreSlot,
      layout: SerializedLayout
    ) {
      const json = yield* Schema.encode(SerializedLayoutJson)(layout).pipe(
        Effect.mapError((cause) => new LayoutStorageError({ operation: "save", slot, cause }))
      )
      yield* Effect.try({
        try: () => store.set(slotKey(slot), json),
        catch: (cause) => new LayoutStorageError({ operation: "save", slot, cause }),
      })
      yield* Effect.logDebug("saved layout").pipe(
        Effect.annotateLogs({ slot, windows: layout.windowCount() })
      )
    })

    const load = Effect.fn("LayoutStorage.load")(function* (slot: StoreSlot) {
      const json = yield* read(slot)

      if (json === undefined) {
        return yield* new SlotNotFoundError({ slot })
      }

      return yield* Schema.decodeUnknown(SerializedLayoutJson)(json).pipe(
        Effect.mapError((cause) => new LayoutCorruptedError({ slot, cause }))
      )
    })

    const remove = Effect.fn("LayoutStorage.remove")(function* (slot: StoreSlot) {
      yield* Effect.try({
        try: () => store.remove(slotKey(slot)),
        catch: (cause) => new LayoutStorageError({ operation: "remove", slot, cause }),
      })
    })

    const clear = Effect.fn("LayoutStorage.clear")(function* (slots: readonly StoreSlot[]) {
      yield* Effect.forEach(slots, remove, { discard: true })
      yield* Effect.logInfo("cleared layout slots").pipe(
        Effect.annotateLogs({ slots: slots.join(",") })
      )
    })

    const exists = Effect.fn("LayoutStorage.exists")(function* (slot: StoreSlot) {
      const json = yield* read(slot)
      return json !== undefined
    })

    return LayoutStorage.of({ save, load, remove, clear, exists })
  }

  /** Production layer - the host's own storage */
  static readonly layer = Layer.effect(
    LayoutStorage,
    Effect.map(Host, (host) => LayoutStorage.make(host.storage))
  )

  /** Test layer - in-memory storage */
  static readonly testLayer = Layer.sync(LayoutStorage, () =>
    LayoutStorage.make(new MemoryStore())
  )
}
