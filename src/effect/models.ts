/**
 * Domain models using Schema.Class for validation and serialization.
 */
import { Schema } from "effect"
import type { RegionConfig, RegionLayout } from "../core/config"
import type { Adjacency, RegionRef } from "../core/types"
import { DisplayId, Fraction, RegionRefTuple } from "./types"

// =============================================================================
// Region Layout Configuration
// =============================================================================

/** Adjacency as written in the layout file */
export const AdjacencyTuples = Schema.Struct({
  north: Schema.optional(RegionRefTuple),
  south: Schema.optional(RegionRefTuple),
  east: Schema.optional(RegionRefTuple),
  west: Schema.optional(RegionRefTuple),
})
export type AdjacencyTuples = typeof AdjacencyTuples.Type

/** One region, in fractions of its display */
export class RegionDefinition extends Schema.Class<RegionDefinition>("RegionDefinition")({
  startPt: Schema.Tuple(Fraction, Fraction),
  width: Fraction,
  height: Fraction,
  adjacent: Schema.optionalWith(AdjacencyTuples, { default: () => ({}) }),
  verticalLayout: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  isDefault: Schema.optionalWith(Schema.Boolean, { default: () => false }),
}) {}

/** Contents of the region layout file */
export class RegionLayoutFile extends Schema.Class<RegionLayoutFile>("RegionLayoutFile")({
  displays: Schema.Record({
    key: DisplayId,
    value: Schema.Record({ key: Schema.String, value: RegionDefinition }),
  }),
  defaultRegion: Schema.optional(RegionRefTuple),
}) {}

const toRegionRef = ([displayId, regionName]: RegionRefTuple): RegionRef => ({
  displayId,
  regionName,
})

const toAdjacency = (tuples: AdjacencyTuples): Adjacency => {
  const adjacency: Adjacency = {}
  if (tuples.north) adjacency.north = toRegionRef(tuples.north)
  if (tuples.south) adjacency.south = toRegionRef(tuples.south)
  if (tuples.east) adjacency.east = toRegionRef(tuples.east)
  if (tuples.west) adjacency.west = toRegionRef(tuples.west)
  return adjacency
}

/** Convert the decoded file into the core's layout shape */
export const toRegionLayout = (file: RegionLayoutFile): RegionLayout => {
  const displays: RegionLayout["displays"] = {}

  for (const [displayId, regions] of Object.entries(file.displays)) {
    const converted: Record<string, RegionConfig> = {}
    for (const [name, definition] of Object.entries(regions)) {
      converted[name] = {
        startPt: definition.startPt,
        width: definition.width,
        height: definition.height,
        adjacent: toAdjacency(definition.adjacent),
        verticalLayout: definition.verticalLayout,
        isDefault: definition.isDefault,
      }
    }
    displays[displayId] = converted
  }

  return {
    displays,
    defaultRegion: file.defaultRegion ? toRegionRef(file.defaultRegion) : undefined,
  }
}

// =============================================================================
// Persisted Layout
// =============================================================================

/** A tracked window, identified by its host hash */
export class SerializedWindow extends Schema.Class<SerializedWindow>("SerializedWindow")({
  id: Schema.Number,
  title: Schema.String,
  app: Schema.String,
}) {}

export class SerializedRegion extends Schema.Class<SerializedRegion>("SerializedRegion")({
  wrappedWindows: Schema.Array(SerializedWindow),
}) {}

export class SerializedDisplay extends Schema.Class<SerializedDisplay>("SerializedDisplay")({
  regions: Schema.Record({ key: Schema.String, value: SerializedRegion }),
}) {}

/** Region membership for every display, as stored in a slot */
export class SerializedLayout extends Schema.Class<SerializedLayout>("SerializedLayout")({
  displays: Schema.Record({ key: Schema.String, value: SerializedDisplay }),
  currentStoreSlot: Schema.NullOr(Schema.String),
}) {
  windowCount(): number {
    let count = 0
    for (const display of Object.values(this.displays)) {
      for (const region of Object.values(display.regions)) {
        count += region.wrappedWindows.length
      }
    }
    return count
  }
}

/** JSON codec for storage */
export const SerializedLayoutJson = Schema.parseJson(SerializedLayout)
