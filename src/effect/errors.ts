/**
 * Tagged errors for the Effect layer.
 */
import { Schema } from "effect"

/** Reading or writing the host key/value store failed */
export class LayoutStorageError extends Schema.TaggedError<LayoutStorageError>()(
  "LayoutStorageError",
  {
    operation: Schema.Literal("load", "save", "remove"),
    slot: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** Nothing has been saved in the slot */
export class SlotNotFoundError extends Schema.TaggedError<SlotNotFoundError>()(
  "SlotNotFoundError",
  {
    slot: Schema.String,
  }
) {}

/** The slot holds data that does not decode as a layout */
export class LayoutCorruptedError extends Schema.TaggedError<LayoutCorruptedError>()(
  "LayoutCorruptedError",
  {
    slot: Schema.String,
    cause: Schema.Defect,
  }
) {}

/** The region layout file could not be read or decoded */
export class ConfigLoadError extends Schema.TaggedError<ConfigLoadError>()(
  "ConfigLoadError",
  {
    path: Schema.String,
    cause: Schema.Defect,
  }
) {}
