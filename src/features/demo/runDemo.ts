/**
 * Demo workload: concurrent workers sharing one terminal.
 *
 * Each worker drives a child bar of the overall one and logs under its
 * own scope. A confirmation at the end shows a prompt
 * taking the terminal over from the bars.
 */

import type { OutputCoordinator } from '../../core/output/OutputCoordinator.js';
import type { ProgressBar } from '../../core/output/ProgressBar.js';
import { sleep } from '../../shared/utils/sleep.js';

export interface DemoOptions {
  workers: number;
  steps: number;
  stepDelayMs: number;
  /** Ask for confirmation before printing the summary */
  ask: boolean;
  signal?: AbortSignal;
}

export interface DemoResult {
  /** Steps completed across all workers */
  completed: number;
  /** Answer to the confirmation, or null when it was not asked */
  confirmed: boolean | null;
}

async function runWorker(
  output: OutputCoordinator,
  overall: ProgressBar,
  index: number,
  options: DemoOptions,
): Promise<number> {
  const name = `worker-${index + 1}`;
  const log = output.logger(name);
  const bar = overall.child(name, { total: options.steps });
  const halfway = Math.ceil(options.steps / 2);

  let completed = 0;
  try {
    for (let step = 1; step <= options.steps; step++) {
      await sleep(options.stepDelayMs * (index + 1), options.signal);
      if (options.signal?.aborted) {
        log.warn(`stopped after ${completed} steps`);
        break;
      }
      bar.advance(1, `step ${step}`);
      overall.advance();
      completed++;
      if (step === halfway) {
        log.info('halfway there');
      }
      log.debug(`finished step ${step}`);
    }
  } finally {
    bar.finish();
  }
  return completed;
}

export async function runDemo(output: OutputCoordinator, options: DemoOptions): Promise<DemoResult> {
  const log = output.logger('demo');
  log.info(`starting ${options.workers} workers`);

  const warmup = output.progress('warming up');
  await sleep(options.stepDelayMs, options.signal);
  warmup.finish();

  const overall = output.progress('overall', { total: options.workers * options.steps, eta: true });
  const counts = await Promise.all(
    Array.from({ length: options.workers }, (_, index) => runWorker(output, overall, index, options)),
  );
  overall.finish();

  const completed = counts.reduce((sum, count) => sum + count, 0);
  let confirmed: boolean | null = null;
  if (options.ask) {
    confirmed = await output.confirm('Print the summary', true, options.signal);
  }
  if (confirmed !== false) {
    output.print(`${completed} steps completed by ${options.workers} workers`);
  }
  await output.flushed();
  return { completed, confirmed };
}
