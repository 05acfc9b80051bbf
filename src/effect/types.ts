/**
 * Branded types and literal schemas for values crossing the service boundary.
 */
import { Schema } from "effect"

// =============================================================================
// Identifiers
// =============================================================================

/** Storage slot, a single digit. "0" is the autosave slot */
export const StoreSlot = Schema.String.pipe(
  Schema.pattern(/^[0-9]$/),
  Schema.brand("StoreSlot")
)
export type StoreSlot = typeof StoreSlot.Type

/** Host screen identifier */
export const DisplayId = Schema.String.pipe(Schema.nonEmptyString())
export type DisplayId = typeof DisplayId.Type

// =============================================================================
// Layout Primitives
// =============================================================================

export const Direction = Schema.Literal("north", "south", "east", "west")
export type Direction = typeof Direction.Type

export const LayoutAction = Schema.Literal("move", "focus", "swap")
export type LayoutAction = typeof LayoutAction.Type

/** `[displayId, regionName]` as written in configuration and storage */
export const RegionRefTuple = Schema.Tuple(DisplayId, Schema.String)
export type RegionRefTuple = typeof RegionRefTuple.Type

/** Fraction of a display dimension */
export const Fraction = Schema.Number.pipe(Schema.between(0, 1))

// =============================================================================
// Helpers
// =============================================================================

/** Validate and brand a slot, throwing on anything but a single digit */
export const makeStoreSlot = (slot: string): StoreSlot => StoreSlot.make(slot)
