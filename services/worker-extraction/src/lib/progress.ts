/**
 * Progress Reporting
 *
 * Stage updates are written in the background so a slow or failing database
 * never stalls the pipeline. Pending writes are tracked so the final result
 * is only saved once every earlier progress write has settled.
 */

import { logger, type ProgressUpdate } from '@finspread/shared';

export type ProgressWriter = (update: ProgressUpdate) => Promise<void>;

export interface ProgressSink {
  report(update: ProgressUpdate): void;
}

export class ProgressReporter implements ProgressSink {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly write: ProgressWriter) {}

  report(update: ProgressUpdate): void {
    const pendingWrite = Promise.resolve()
      .then(() => this.write(update))
      .catch((error: unknown) => {
        logger.warn('Failed to record pipeline progress', {
          stage: update.stage,
          progress: update.progress,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pending.delete(pendingWrite);
      });

    this.pending.add(pendingWrite);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Resolves once every write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }
}
