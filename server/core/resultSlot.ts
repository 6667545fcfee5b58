export type SlotWaitOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'timeout' }
  | { kind: 'aborted' };

/**
 * Single-producer/single-consumer handoff. The first `deliver` wins; later
 * deliveries and deliveries after the waiter gave up are accepted and dropped.
 */
export class ResultSlot<T> {
  private settled: { value: T } | undefined;
  private readonly listeners = new Set<(value: T) => void>();

  get delivered(): boolean {
    return this.settled !== undefined;
  }

  peek(): T | undefined {
    return this.settled?.value;
  }

  deliver(value: T): boolean {
    if (this.settled) return false;
    this.settled = { value };
    for (const listener of Array.from(this.listeners)) listener(value);
    this.listeners.clear();
    return true;
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<SlotWaitOutcome<T>> {
    if (this.settled) return Promise.resolve({ kind: 'value', value: this.settled.value });
    if (signal?.aborted) return Promise.resolve({ kind: 'aborted' });

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        this.listeners.delete(onValue);
        signal?.removeEventListener('abort', onAbort);
      };
      const onValue = (value: T) => {
        cleanup();
        resolve({ kind: 'value', value });
      };
      const onAbort = () => {
        cleanup();
        resolve({ kind: 'aborted' });
      };

      this.listeners.add(onValue);
      signal?.addEventListener('abort', onAbort, { once: true });
      timer = setTimeout(() => {
        cleanup();
        resolve({ kind: 'timeout' });
      }, Math.max(0, timeoutMs));
    });
  }
}
