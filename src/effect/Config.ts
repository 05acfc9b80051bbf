/**
 * Application configuration read through Effect's ConfigProvider.
 */
import { readFile } from "node:fs/promises"
import { Config, Context, Effect, Layer, LogLevel, Option, Schema } from "effect"
import { DEFAULT_CONFIG } from "../core/config"
import type { LayoutConfig, RegionLayout } from "../core/config"
import { ConfigLoadError } from "./errors"
import { RegionLayoutFile, toRegionLayout } from "./models"

// =============================================================================
// Service Definition
// =============================================================================

export interface AppConfigShape {
  readonly layout: LayoutConfig
  readonly regions: RegionLayout
  readonly logLevel: LogLevel.LogLevel
}

const EMPTY_REGIONS: RegionLayout = { displays: {} }

const withDefault = <A>(config: Config.Config<A>, fallback: A) =>
  config.pipe(Config.withDefault(fallback))

const layoutConfig: Config.Config<LayoutConfig> = Config.all({
  margin: withDefault(Config.number("TILER_MARGIN"), DEFAULT_CONFIG.margin),
  growActiveWindow: withDefault(
    Config.boolean("TILER_GROW_ACTIVE_WINDOW"),
    DEFAULT_CONFIG.growActiveWindow
  ),
  mouseFollow: withDefault(Config.boolean("TILER_MOUSE_FOLLOW"), DEFAULT_CONFIG.mouseFollow),
  autoDistribute: withDefault(
    Config.boolean("TILER_AUTO_DISTRIBUTE"),
    DEFAULT_CONFIG.autoDistribute
  ),
  autoRestore: withDefault(Config.boolean("TILER_AUTO_RESTORE"), DEFAULT_CONFIG.autoRestore),
  defaultStoreSlot: withDefault(
    Config.string("TILER_DEFAULT_STORE_SLOT").pipe(
      Config.validate({
        message: "must be a single digit",
        validation: (slot: string) => /^[0-9]$/.test(slot),
      })
    ),
    DEFAULT_CONFIG.defaultStoreSlot
  ),
  defaultAutoSave: withDefault(
    Config.boolean("TILER_DEFAULT_AUTO_SAVE"),
    DEFAULT_CONFIG.defaultAutoSave
  ),
  currentAutoSave: withDefault(
    Config.boolean("TILER_CURRENT_AUTO_SAVE"),
    DEFAULT_CONFIG.currentAutoSave
  ),
  dragDebounceMs: withDefault(
    Config.integer("TILER_DRAG_DEBOUNCE_MS"),
    DEFAULT_CONFIG.dragDebounceMs
  ),
  focusRetryLimit: withDefault(
    Config.integer("TILER_FOCUS_RETRY_LIMIT"),
    DEFAULT_CONFIG.focusRetryLimit
  ),
})

/**
 * Read and decode a region layout file
 */
export const loadRegionLayout = Effect.fn("AppConfig.loadRegionLayout")(function* (
  path: string
) {
  const text = yield* Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: (cause) => new ConfigLoadError({ path, cause }),
  })

  const file = yield* Schema.decodeUnknown(Schema.parseJson(RegionLayoutFile))(text).pipe(
    Effect.mapError((cause) => new ConfigLoadError({ path, cause }))
  )

  yield* Effect.logDebug("loaded region layout").pipe(
    Effect.annotateLogs({ path, displays: Object.keys(file.displays).length })
  )
  return toRegionLayout(file)
})

export class AppConfig extends Context.Tag("@tilewright/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - environment by default, region layout from TILER_REGIONS_PATH */
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.gen(function* () {
      const layout = yield* layoutConfig
      const logLevel = yield* withDefault(Config.logLevel("TILER_LOG_LEVEL"), LogLevel.Info)
      const regionsPath = yield* Config.option(Config.string("TILER_REGIONS_PATH"))

      const regions = Option.isSome(regionsPath)
        ? yield* loadRegionLayout(regionsPath.value)
        : EMPTY_REGIONS

      return AppConfig.of({ layout, regions, logLevel })
    })
  )

  /** Test layer - defaults with optional overrides */
  static readonly testLayer = (
    overrides: {
      layout?: Partial<LayoutConfig>
      regions?: RegionLayout
      logLevel?: LogLevel.LogLevel
    } = {}
  ) =>
    Layer.succeed(
      AppConfig,
      AppConfig.of({
        layout: { ...DEFAULT_CONFIG, ...overrides.layout },
        regions: overrides.regions ?? EMPTY_REGIONS,
        logLevel: overrides.logLevel ?? LogLevel.None,
      })
    )
}
