/**
 * Sleep between poll cycles that ends early on a wake-up or an abort.
 * A wake-up that arrives while no sleep is pending makes the next sleep return at once.
 */
export class PollWaker {
  private wakePending = false;
  private finishSleep: (() => void) | null = null;

  wake(): void {
    if (this.finishSleep) {
      this.finishSleep();
      return;
    }
    this.wakePending = true;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (this.wakePending || signal?.aborted) {
      this.wakePending = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", finish);
        this.finishSleep = null;
        resolve();
      };
      const timer = setTimeout(finish, Math.max(0, ms));
      signal?.addEventListener("abort", finish, { once: true });
      this.finishSleep = finish;
    });
  }
}
