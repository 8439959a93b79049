/**
 * BackgroundTasks
 *
 * Fire-and-forget runner for propagation work. Tasks on the same lane
 * (one lane per entity) run one after another; a task whose key is already
 * waiting on that lane is dropped, since the waiting one re-reads local state
 * when it starts anyway. Failures are logged, never thrown to the caller.
 */

type Work = () => Promise<void>;

export class BackgroundTasks {
  private lanes: Map<string, Promise<void>> = new Map();
  private waiting: Map<string, Set<string>> = new Map();
  private inFlight: Set<Promise<void>> = new Set();

  constructor(private readonly name: string = 'BackgroundTasks') {}

  /**
   * Schedule work on a lane. Returns false when it was coalesced into a
   * waiting task with the same key.
   */
  run(lane: string, key: string, work: Work): boolean {
    const waitingKeys = this.waiting.get(lane) ?? new Set<string>();
    if (waitingKeys.has(key)) {
      return false;
    }
    waitingKeys.add(key);
    this.waiting.set(lane, waitingKeys);

    const previous = this.lanes.get(lane) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => {
        waitingKeys.delete(key);
        return work();
      })
      .catch((error: unknown) => {
        console.error(`[${this.name}] Task ${key} on ${lane} failed:`, error);
      })
      .then(() => {
        this.inFlight.delete(next);
        if (this.lanes.get(lane) === next) {
          this.lanes.delete(lane);
          this.waiting.delete(lane);
        }
      });

    this.lanes.set(lane, next);
    this.inFlight.add(next);
    return true;
  }

  get size(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every scheduled task, including ones scheduled while
   * draining, has finished.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
