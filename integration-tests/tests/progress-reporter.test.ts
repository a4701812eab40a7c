/**
 * Background progress writes
 */

import type { ProgressUpdate } from '@finspread/shared';
import { ProgressReporter } from '../../services/worker-extraction/src/lib/progress';

describe('ProgressReporter', () => {
  it('should return before the write finishes', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const written: ProgressUpdate[] = [];
    const reporter = new ProgressReporter(async (update) => {
      await gate;
      written.push(update);
    });

    reporter.report({ stage: 'ocr', progress: 15 });

    expect(reporter.pendingCount).toBe(1);
    expect(written).toEqual([]);

    release();
    await reporter.flush();

    expect(written).toEqual([{ stage: 'ocr', progress: 15 }]);
    expect(reporter.pendingCount).toBe(0);
  });

  it('should start writes in the order they were reported', async () => {
    const started: string[] = [];
    const reporter = new ProgressReporter(async (update) => {
      started.push(update.stage);
    });

    reporter.report({ stage: 'ocr', progress: 15 });
    reporter.report({ stage: 'tables', progress: 30 });
    reporter.report({ stage: 'ner', progress: 50 });
    await reporter.flush();

    expect(started).toEqual(['ocr', 'tables', 'ner']);
  });

  it('should absorb a failed write', async () => {
    const reporter = new ProgressReporter(async () => {
      throw new Error('connection refused');
    });

    reporter.report({ stage: 'ocr', progress: 15 });

    await expect(reporter.flush()).resolves.toBeUndefined();
    expect(reporter.pendingCount).toBe(0);
  });

  it('should flush immediately when nothing is pending', async () => {
    const reporter = new ProgressReporter(async () => undefined);
    await expect(reporter.flush()).resolves.toBeUndefined();
  });
});
