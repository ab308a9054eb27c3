#!/usr/bin/env node

/**
 * linegate CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { program } from './program.js';
import './commands.js';
import { ConfigError, PromptNotAllowedError, getErrorMessage } from '../../shared/utils/error.js';
import {
  EXIT_CONFIG_ERROR,
  EXIT_GENERAL_ERROR,
  EXIT_PROMPT_NOT_ALLOWED,
} from '../../shared/exitCodes.js';

function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError) return EXIT_CONFIG_ERROR;
  if (err instanceof PromptNotAllowedError) return EXIT_PROMPT_NOT_ALLOWED;
  return EXIT_GENERAL_ERROR;
}

(async () => {
  await program.parseAsync();
})().catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof PromptNotAllowedError) {
    console.error(`linegate: ${getErrorMessage(err)}`);
  } else {
    console.error(err);
  }
  process.exit(exitCodeFor(err));
});
