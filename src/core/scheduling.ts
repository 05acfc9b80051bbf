/**
 * Cooperative scheduling helpers for coalescing bursts of host events.
 */

export interface DebouncerOptions<A> {
  /** Quiet period after the last call before `run` fires */
  delayMs: number;
  /** Coalesced handler, called with the last argument of the burst */
  run: (arg: A) => void;
  /** Fired synchronously on the first call of each burst */
  onBurstStart?: () => void;
}

export interface Debouncer<A> {
  push(arg: A): void;
  cancel(): void;
  isPending(): boolean;
}

/**
 * Trailing-edge debounce. Every `push` restarts the timer, so `run` fires at
 * most once per quiet period.
 */
export function createDebouncer<A>(options: DebouncerOptions<A>): Debouncer<A> {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const cancel = (): void => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };

  return {
    push(arg: A) {
      if (timer === null) {
        options.onBurstStart?.();
      } else {
        clearTimeout(timer);
      }
      timer = setTimeout(() => {
        timer = null;
        options.run(arg);
      }, options.delayMs);
    },
    cancel,
    isPending: () => timer !== null,
  };
}
