/**
 * Verbosity from repeated -v / -q flags.
 */

import type { VerbosityLevel } from '../../core/models/severity.js';

/**
 * Map flag counts to a level: -qq off, -q error, none info, -v debug, -vv trace.
 * @returns undefined when no flag was given, so configuration decides
 */
export function verbosityFromFlags(verbose: number, quiet: number): VerbosityLevel | undefined {
  if (verbose === 0 && quiet === 0) {
    return undefined;
  }
  const net = verbose - quiet;
  if (net <= -2) return 'off';
  if (net === -1) return 'error';
  if (net === 0) return 'info';
  if (net === 1) return 'debug';
  return 'trace';
}
