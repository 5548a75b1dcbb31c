export interface Debounced<Args extends unknown[]> {
  (...args: Args): void;
  /** Drops the scheduled call, if any. */
  cancel(): void;
  /** True while a call is waiting for its timer. */
  isPending(): boolean;
}

/**
 * Delays `func` until `wait` ms have passed without another call. Each call
 * restarts the timer and replaces the arguments, so a burst collapses into one
 * invocation with the last arguments.
 */
export default function debounce<Args extends unknown[]>(
  func: (...args: Args) => void,
  wait: number
): Debounced<Args> {
  let timeout: ReturnType<typeof setTimeout> | null = null;

  const debounced = (...args: Args) => {
    const later = () => {
      timeout = null;
      func(...args);
    };
    if (timeout) {
      clearTimeout(timeout);
    }
    timeout = setTimeout(later, wait);
  };

  return Object.assign(debounced, {
    cancel: () => {
      if (timeout) {
        clearTimeout(timeout);
        timeout = null;
      }
    },
    isPending: () => timeout !== null,
  });
}
