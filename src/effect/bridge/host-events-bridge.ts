/**
 * Host events bridge
 * Feeds the host's window and mouse events into LayoutManager
 */

import { Cause, Effect, Fiber, Queue, Stream } from "effect"
import type { HostEvent, WindowHost } from "../../core/host"
import type { AppRuntime } from "../runtime"
import { LayoutManager } from "../services"

/** Route one host event to the matching LayoutManager operation */
export const dispatchHostEvent = Effect.fn("HostEvents.dispatch")(function* (event: HostEvent) {
  const manager = yield* LayoutManager
  switch (event.type) {
    case "windowOpened":
      return yield* manager.windowOpened(event.window)
    case "windowClosed":
      return yield* manager.windowClosed(event.window)
    case "mouseClick":
      return yield* manager.mouseClick(event.point)
    case "mouseDrag":
      return yield* manager.dragSample(event.point)
  }
})

/**
 * Subscribe to the host and dispatch its events in order. The subscription
 * is in place when this returns; events queue until the stream takes them.
 *
 * @returns a function that unsubscribes
 */
export function bindHostEvents(runtime: AppRuntime, host: WindowHost): () => void {
  const queue = Effect.runSync(Queue.unbounded<HostEvent>())
  const unsubscribe = host.subscribe((event) => {
    Queue.unsafeOffer(queue, event)
  })

  const events = Stream.fromQueue(queue).pipe(
    Stream.mapEffect((event) =>
      dispatchHostEvent(event).pipe(
        Effect.catchAllCause((cause) =>
          Effect.logError("host event failed", cause).pipe(
            Effect.annotateLogs({ event: event.type })
          )
        )
      )
    )
  )
  const fiber = runtime.runFork(
    Stream.runDrain(events).pipe(
      Effect.catchAllCause((cause) =>
        Cause.isInterruptedOnly(cause)
          ? Effect.void
          : Effect.logError("host event stream stopped", cause)
      )
    )
  )

  return () => {
    unsubscribe()
    runtime.runFork(Fiber.interrupt(fiber))
    Effect.runSync(Queue.shutdown(queue))
  }
}
