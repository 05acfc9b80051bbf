/**
 * Keybindings service
 * Registers the global hotkeys and routes them to LayoutManager
 */

import { Context, Effect, Layer, Ref, Runtime } from "effect"
import { SAVE_SLOTS } from "../../core/config"
import type { HotkeyHandle, Modifier } from "../../core/host"
import type { Direction, LayoutAction } from "../../core/types"
import { makeStoreSlot } from "../types"
import { Host } from "./Host"
import { LayoutManager } from "./LayoutManager"

// =============================================================================
// Types
// =============================================================================

/** hjkl -> direction */
export const DIRECTION_KEYS: Record<string, Direction> = {
  h: "west",
  j: "south",
  k: "north",
  l: "east",
}

/** Modifier chord per directional action */
export const ACTION_MODIFIERS: Record<LayoutAction, readonly Modifier[]> = {
  focus: ["ctrl", "alt"],
  move: ["ctrl", "cmd"],
  swap: ["shift", "cmd"],
}

export const SLOT_MODIFIERS = {
  store: ["alt", "ctrl"],
  restore: ["cmd", "ctrl"],
  clear: ["alt", "ctrl", "cmd"],
} as const satisfies Record<string, readonly Modifier[]>

interface Bindings {
  directional: HotkeyHandle[]
  other: HotkeyHandle[]
}

const EMPTY_BINDINGS: Bindings = { directional: [], other: [] }

// =============================================================================
// Service Definition
// =============================================================================

export class Keybindings extends Context.Tag("@tilewright/Keybindings")<
  Keybindings,
  {
    /** Bind every hotkey. Calling it again replaces the previous bindings */
    readonly register: () => Effect.Effect<void>

    /** Disable every bound hotkey */
    readonly unregister: () => Effect.Effect<void>

    /**
     * Turn the hjkl bindings on or off. Off is a passthrough mode where the
     * keys reach applications.
     */
    readonly setDirectionalEnabled: (enabled: boolean) => Effect.Effect<void>

    readonly isDirectionalEnabled: () => Effect.Effect<boolean>
  }
>() {
  static readonly layer = Layer.effect(
    Keybindings,
    Effect.gen(function* () {
      const host = yield* Host
      const manager = yield* LayoutManager
      const runtime = yield* Effect.runtime<never>()
      const runSync = Runtime.runSync(runtime)

      const bindingsRef = yield* Ref.make<Bindings>(EMPTY_BINDINGS)
      const directionalRef = yield* Ref.make(true)

      // Hotkey handlers run on the host's event loop; nothing may escape them
      const handler =
        <E>(label: string, effect: () => Effect.Effect<unknown, E>) =>
        () =>
          runSync(
            effect().pipe(
              Effect.asVoid,
              Effect.catchAllCause((cause) =>
                Effect.logError("keybinding failed", cause).pipe(
                  Effect.annotateLogs({ binding: label })
                )
              )
            )
          )

      const setDirectionalEnabled = Effect.fn("Keybindings.setDirectionalEnabled")(function* (
        enabled: boolean
      ) {
        const { directional } = yield* Ref.get(bindingsRef)
        for (const binding of directional) {
          if (enabled) binding.enable()
          else binding.disable()
        }
        yield* Ref.set(directionalRef, enabled)
        yield* Effect.logInfo(enabled ? "Mode: Normal" : "Passthrough mode")
      })

      const unregister = Effect.fn("Keybindings.unregister")(function* () {
        const { directional, other } = yield* Ref.get(bindingsRef)
        for (const binding of [...directional, ...other]) {
          binding.disable()
        }
        yield* Ref.set(bindingsRef, EMPTY_BINDINGS)
      })

      const register = Effect.fn("Keybindings.register")(function* () {
        yield* unregister()

        const directional: HotkeyHandle[] = []
        const other: HotkeyHandle[] = []

        for (const [key, direction] of Object.entries(DIRECTION_KEYS)) {
          for (const action of ["focus", "move", "swap"] as const) {
            directional.push(
              host.bindKey(
                key,
                ACTION_MODIFIERS[action],
                handler(`${action}-${direction}`, () => manager.doAction(action, direction))
              )
            )
          }
        }

        for (const key of SAVE_SLOTS) {
          const slot = makeStoreSlot(key)
          other.push(
            host.bindKey(key, SLOT_MODIFIERS.store, handler(`store-${key}`, () => manager.saveSlot(slot))),
            host.bindKey(
              key,
              SLOT_MODIFIERS.restore,
              handler(`restore-${key}`, () => manager.restoreSlot(slot))
            ),
            host.bindKey(key, SLOT_MODIFIERS.clear, handler(`clear-${key}`, () => manager.clearSlot(slot)))
          )
        }

        other.push(
          host.bindKey("c", ["cmd", "ctrl"], handler("clear-all", () => manager.clearAllSlots())),
          host.bindKey(
            "r",
            ["cmd", "ctrl"],
            handler("toggle-mode", () =>
              Effect.flatMap(Ref.get(directionalRef), (enabled) => setDirectionalEnabled(!enabled))
            )
          ),
          host.bindKey("escape", ["cmd"], handler("normal-mode", () => setDirectionalEnabled(true)))
        )

        yield* Ref.set(bindingsRef, { directional, other })
        yield* Ref.set(directionalRef, true)
        yield* Effect.logDebug("keybindings registered").pipe(
          Effect.annotateLogs({ count: directional.length + other.length })
        )
      })

      return Keybindings.of({
        register,
        unregister,
        setDirectionalEnabled,
        isDirectionalEnabled: () => Ref.get(directionalRef),
      })
    })
  )
}
