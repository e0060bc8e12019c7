import { createLogger } from '../core/logger.js';
import type { Consolidator, ConsolidationOutcome } from './consolidator.js';

const log = createLogger('scheduler');

export interface SchedulerOptions {
  intervalMs: number;
  onOutcome?: (outcome: ConsolidationOutcome) => void;
  onError?: (error: unknown) => void;
}

/**
 * Periodic trigger for consolidation. Overlapping ticks are harmless: the
 * consolidator rejects them while a run is in flight.
 */
export class ConsolidationScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private consolidator: Consolidator,
    private options: SchedulerOptions
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<ConsolidationOutcome | undefined> {
    try {
      const outcome = await this.consolidator.consolidate();
      if (outcome.status === 'rejected') {
        log.debug('tick skipped: consolidation already in progress');
      }
      this.options.onOutcome?.(outcome);
      return outcome;
    } catch (error) {
      log.error(`scheduled consolidation failed: ${error instanceof Error ? error.message : String(error)}`);
      this.options.onError?.(error);
      return undefined;
    }
  }
}
