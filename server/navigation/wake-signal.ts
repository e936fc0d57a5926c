export type WakeReason = "signalled" | "timeout" | "aborted";

/**
 * Latching wake notification. `set()` stays latched until `consume()`, so a
 * signal raised before a waiter arrives still wakes it.
 */
export class WakeSignal {
  private latched = false;
  private readonly waiters = new Set<() => void>();

  set(): void {
    this.latched = true;
    for (const wake of [...this.waiters]) {
      wake();
    }
  }

  isSet(): boolean {
    return this.latched;
  }

  consume(): boolean {
    const was = this.latched;
    this.latched = false;
    return was;
  }

  wait(timeoutMs: number, signal?: AbortSignal): Promise<WakeReason> {
    if (signal?.aborted) return Promise.resolve("aborted");
    if (this.latched) return Promise.resolve("signalled");

    return new Promise<WakeReason>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const settle = (reason: WakeReason) => {
        if (timer) clearTimeout(timer);
        timer = null;
        this.waiters.delete(onSet);
        signal?.removeEventListener("abort", onAbort);
        resolve(reason);
      };
      const onSet = () => settle("signalled");
      const onAbort = () => settle("aborted");

      this.waiters.add(onSet);
      signal?.addEventListener("abort", onAbort, { once: true });
      timer = setTimeout(() => settle("timeout"), Math.max(0, timeoutMs));
    });
  }
}
