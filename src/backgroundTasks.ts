/**
 * Fire-and-forget work whose failures are logged and never reach the caller
 * that started it.
 */
export class BackgroundTasks {
  private readonly tag: string;
  private inFlight: Set<Promise<void>>;

  constructor(tag: string) {
    this.tag = tag;
    this.inFlight = new Set();
  }

  run(label: string, task: () => Promise<void>): void {
    const promise = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        console.warn(`[${this.tag}] ${label} failed.`, error);
      })
      .finally(() => {
        this.inFlight.delete(promise);
      });
    this.inFlight.add(promise);
  }

  /** Wait until everything started so far, and anything it queues, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }
}
