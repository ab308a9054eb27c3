/**
 * CLI subcommand definitions
 */

import { runDemo } from '../../features/demo/index.js';
import { getOutput } from '../../shared/ui/index.js';
import { program, cleanupExitHooks } from './program.js';
import { parseNonNegativeInt, parsePositiveInt } from './helpers.js';

interface DemoCommandOptions {
  workers: number;
  steps: number;
  delay: number;
  prompt: boolean;
  timeout?: number;
}

program
  .command('demo')
  .description('Run concurrent workers that log, report progress and ask a question')
  .option('-w, --workers <count>', 'Number of concurrent workers', parsePositiveInt, 3)
  .option('-s, --steps <count>', 'Steps per worker', parsePositiveInt, 20)
  .option('--delay <ms>', 'Delay per step in milliseconds', parseNonNegativeInt, 80)
  .option('--no-prompt', 'Skip the confirmation at the end')
  .option('--timeout <ms>', 'Stop the workers and the prompt after this many milliseconds', parsePositiveInt)
  .action(async (opts: DemoCommandOptions) => {
    const output = getOutput();
    try {
      await runDemo(output, {
        workers: opts.workers,
        steps: opts.steps,
        stepDelayMs: opts.delay,
        ask: opts.prompt,
        signal: opts.timeout === undefined ? undefined : AbortSignal.timeout(opts.timeout),
      });
    } finally {
      await output.shutdown();
      cleanupExitHooks();
    }
  });
