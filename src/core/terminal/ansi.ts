/**
 * Raw cursor-control sequences.
 * Colors go through chalk; only cursor movement is spelled out here.
 */

export const ESC = '\x1b';

/** Move the cursor one line up */
export const CURSOR_UP = `${ESC}[1A`;

/** Erase the whole current line */
export const ERASE_LINE = `${ESC}[2K`;

/**
 * Sequence that erases the `count` lines above the cursor,
 * leaving the cursor at the start of the topmost erased line.
 */
export function clearLinesSequence(count: number): string {
  if (count <= 0) {
    return '';
  }
  return '\r' + (CURSOR_UP + ERASE_LINE).repeat(count);
}
