/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook that builds the output coordinator.
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { Command, Option } from 'commander';
import { loadOutputConfig, toCoordinatorOptions } from '../../infra/config/index.js';
import { initOutput, isOutputInitialized } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, setVerboseConsole } from '../../shared/utils/debug.js';
import type { ExitHooks } from '../../core/output/OutputCoordinator.js';
import { increaseCount, resolveGlobalSettings, type GlobalOptions } from './helpers.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

let exitHooks: ExitHooks | null = null;

export { cliVersion };

export const program = new Command();

program
  .name('linegate')
  .description('Coordinated terminal output for concurrent tasks')
  .version(cliVersion);

// --- Global options ---
program
  .option('-v, --verbose', 'More output (repeatable: -vv for trace)', increaseCount, 0)
  .option('-q, --quiet', 'Less output (repeatable: -qq silences everything)', increaseCount, 0)
  .addOption(new Option('--color <mode>', 'Color output').choices(['auto', 'always', 'never']))
  .option('-y, --yes', 'Answer yes to every confirmation')
  .option('--non-interactive', 'Fail instead of prompting')
  .option('--config <path>', 'Config file (default: ./.linegate.yaml)');

// Common initialization for all commands
program.hook('preAction', () => {
  const cwd = resolve(process.cwd());

  const opts = program.opts<GlobalOptions>();
  const config = loadOutputConfig({ path: opts.config, cwd });

  initDebugLogger(config.debug, cwd);
  const settings = resolveGlobalSettings(opts, config);
  if (settings.level === 'trace') {
    setVerboseConsole(true);
  }

  if (!isOutputInitialized()) {
    const output = initOutput({
      ...toCoordinatorOptions(config),
      level: settings.level,
      color: settings.color,
      promptPolicy: settings.promptPolicy,
    });
    exitHooks = output.installExitHooks();
  }

  log.info('linegate CLI starting', { version: cliVersion, cwd, ...settings });
});

/** Remove process hooks installed by the preAction hook */
export function cleanupExitHooks(): void {
  exitHooks?.cleanup();
  exitHooks = null;
}
