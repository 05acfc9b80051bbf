/**
 * Application runtime
 * Composes the service layers over a concrete host.
 */

import { ConfigProvider, Effect, Layer, Logger, ManagedRuntime } from "effect"
import type { WindowHost } from "../core/host"
import { AppConfig } from "./Config"
import { Host, Keybindings, LayoutManager, LayoutStorage } from "./services"

export interface AppLayerOptions {
  /** Where configuration is read from. Defaults to the environment */
  readonly configProvider?: ConfigProvider.ConfigProvider
}

/**
 * Full application layer
 *
 * Host -> LayoutStorage, AppConfig -> LayoutManager -> Keybindings
 */
export const makeAppLayer = (host: WindowHost, options: AppLayerOptions = {}) => {
  const hostLayer = Host.layer(host)

  const configLayer = options.configProvider
    ? AppConfig.layer.pipe(Layer.provide(Layer.setConfigProvider(options.configProvider)))
    : AppConfig.layer

  const loggerLayer = Layer.unwrapEffect(
    Effect.map(AppConfig, (config) => Logger.minimumLogLevel(config.logLevel))
  ).pipe(Layer.provide(configLayer))

  const managerLayer = LayoutManager.layer.pipe(
    Layer.provide(LayoutStorage.layer),
    Layer.provideMerge(Layer.mergeAll(hostLayer, configLayer))
  )

  return Keybindings.layer.pipe(Layer.provideMerge(managerLayer), Layer.merge(loggerLayer))
}

export type AppServices = Layer.Layer.Success<ReturnType<typeof makeAppLayer>>
export type AppLayerError = Layer.Layer.Error<ReturnType<typeof makeAppLayer>>

export type AppRuntime = ManagedRuntime.ManagedRuntime<AppServices, AppLayerError>

export const makeAppRuntime = (host: WindowHost, options: AppLayerOptions = {}): AppRuntime =>
  ManagedRuntime.make(makeAppLayer(host, options))

/**
 * Run an effect against the runtime, as a promise
 */
export const runEffect = <A, E>(
  runtime: AppRuntime,
  effect: Effect.Effect<A, E, AppServices>
): Promise<A> => runtime.runPromise(effect)
