/**
 * RetryScheduler
 *
 * Periodically asks every registered participant to retry its pending set.
 * The interval starts at the base delay, doubles after each sweep in which
 * nothing went through, caps at the max delay and resets after any success.
 */

import { SYNC_CONFIG, getNextRetryDelay } from '../types';
import type { RetryParticipant, SweepOutcome } from '../types';

export type ScheduleListener = (delayMs: number) => void;

export function combineOutcomes(outcomes: SweepOutcome[]): SweepOutcome {
  if (outcomes.includes('success')) return 'success';
  if (outcomes.includes('failure')) return 'failure';
  return 'idle';
}

export class RetryScheduler {
  private participants: Set<RetryParticipant> = new Set();
  private listeners: Set<ScheduleListener> = new Set();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private activeSweep: Promise<SweepOutcome> | null = null;
  private delayMs: number = SYNC_CONFIG.RETRY_BASE_DELAY_MS;
  private generation = 0;
  private running = false;

  register(participant: RetryParticipant): () => void {
    this.participants.add(participant);
    return () => {
      this.participants.delete(participant);
    };
  }

  /**
   * Subscribe to the delay of each scheduled sweep.
   */
  onScheduled(listener: ScheduleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get currentDelayMs(): number {
    return this.delayMs;
  }

  get participantNames(): string[] {
    return [...this.participants].map((participant) => participant.name);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.delayMs = SYNC_CONFIG.RETRY_BASE_DELAY_MS;
    this.scheduleNext();
  }

  /**
   * Stop scheduling. A sweep already running finishes its current item and
   * then skips the remaining ones.
   */
  stop(): void {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one sweep now. Concurrent calls share the sweep in progress.
   */
  runSweep(): Promise<SweepOutcome> {
    if (!this.activeSweep) {
      this.activeSweep = this.sweep().finally(() => {
        this.activeSweep = null;
      });
    }
    return this.activeSweep;
  }

  private async sweep(): Promise<SweepOutcome> {
    const generation = this.generation;
    const isCancelled = () => generation !== this.generation;
    const outcomes: SweepOutcome[] = [];

    for (const participant of [...this.participants]) {
      if (isCancelled()) break;

      try {
        outcomes.push(await participant.retryPending(isCancelled));
      } catch (error) {
        console.error(`[RetryScheduler] ${participant.name} retry failed:`, error);
        outcomes.push('failure');
      }
    }

    return combineOutcomes(outcomes);
  }

  private scheduleNext(): void {
    if (!this.running) return;

    const delay = this.delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runSweep()
        .then((outcome) => {
          this.delayMs = getNextRetryDelay(delay, outcome);
          if (outcome === 'failure') {
            console.info(`[RetryScheduler] Increasing retry interval to ${this.delayMs / 1000}s`);
          }
          this.scheduleNext();
        })
        .catch(console.error);
    }, delay);
    this.timer.unref();

    for (const listener of this.listeners) {
      listener(delay);
    }
  }
}
