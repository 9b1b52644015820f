/**
 * Let queued I/O and timers run before continuing a long CPU-bound loop
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
