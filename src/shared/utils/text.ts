/**
 * Text display width utilities
 *
 * Pure functions for calculating and truncating text based on
 * terminal display width, with full-width (CJK) and emoji support.
 */

/** Matches CSI/OSC escape sequences and bare ESC-prefixed controls */
const ANSI_PATTERN = /\x1b(?:\[[0-?]*[ -/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[@-Z\\-_])/g;

/**
 * Remove terminal escape sequences from text.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** Resets every SGR attribute; closes a styled span cut by truncation */
export const SGR_RESET = '\x1b[0m';

export interface TextSegment {
  text: string;
  /** True for an escape sequence, which takes no columns */
  escape: boolean;
}

/**
 * Split text into visible runs and escape sequences, in order.
 */
export function splitAnsi(text: string): TextSegment[] {
  const segments: TextSegment[] = [];
  let last = 0;
  for (const match of text.matchAll(ANSI_PATTERN)) {
    const index = match.index ?? last;
    if (index > last) {
      segments.push({ text: text.slice(last, index), escape: false });
    }
    segments.push({ text: match[0], escape: true });
    last = index + match[0].length;
  }
  if (last < text.length) {
    segments.push({ text: text.slice(last), escape: false });
  }
  return segments;
}

/**
 * Check if a Unicode code point is full-width (occupies 2 columns).
 * Covers CJK unified ideographs, Hangul, fullwidth forms, etc.
 */
export function isFullWidth(code: number): boolean {
  return (
    (code >= 0x1100 && code <= 0x115F) ||  // Hangul Jamo
    (code >= 0x2E80 && code <= 0x9FFF) ||  // CJK radicals, symbols, ideographs
    (code >= 0xAC00 && code <= 0xD7AF) ||  // Hangul syllables
    (code >= 0xF900 && code <= 0xFAFF) ||  // CJK compatibility ideographs
    (code >= 0xFE10 && code <= 0xFE6F) ||  // CJK compatibility forms
    (code >= 0xFF01 && code <= 0xFF60) ||  // Fullwidth ASCII variants
    (code >= 0xFFE0 && code <= 0xFFE6) ||  // Fullwidth symbols
    (code >= 0x20000 && code <= 0x2FA1F)   // CJK extension B+
  );
}

/** Emoji drawn with emoji presentation, two columns wide */
export function isWideEmoji(code: number): boolean {
  return (
    (code >= 0x1F1E6 && code <= 0x1F1FF) ||  // Regional indicators
    (code >= 0x1F300 && code <= 0x1F64F) ||  // Pictographs, emoticons
    (code >= 0x1F680 && code <= 0x1F6FF) ||  // Transport and map
    (code >= 0x1F900 && code <= 0x1F9FF) ||  // Supplemental symbols
    (code >= 0x1FA70 && code <= 0x1FAFF)     // Symbols and pictographs ext-A
  );
}

function isZeroWidth(code: number): boolean {
  return (
    (code >= 0x0300 && code <= 0x036F) ||  // Combining diacritics
    (code >= 0x200B && code <= 0x200F) ||  // Zero-width space, joiners, marks
    (code >= 0x20D0 && code <= 0x20FF) ||  // Combining marks for symbols
    (code >= 0xFE00 && code <= 0xFE0F)     // Variation selectors
  );
}

/** Terminal columns taken by one code point */
export function charWidth(code: number): number {
  if (isZeroWidth(code)) return 0;
  return isFullWidth(code) || isWideEmoji(code) ? 2 : 1;
}

/**
 * Calculate the display width of a string.
 * Escape sequences take no columns; wide characters count as 2.
 */
export function getDisplayWidth(text: string): number {
  let width = 0;
  for (const segment of splitAnsi(text)) {
    if (segment.escape) continue;
    for (const char of segment.text) {
      width += charWidth(char.codePointAt(0) ?? 0);
    }
  }
  return width;
}

/**
 * Truncate text to fit within maxWidth display columns.
 * Appends '…' if truncated (the ellipsis counts as 1 column). Escape
 * sequences before the cut are kept and closed with a reset.
 */
export function truncateText(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (getDisplayWidth(text) <= maxWidth) return text;

  const budget = maxWidth - 1;
  let kept = '';
  let width = 0;
  let styled = false;
  let full = false;
  for (const segment of splitAnsi(text)) {
    if (segment.escape) {
      kept += segment.text;
      styled = true;
      continue;
    }
    for (const char of segment.text) {
      const w = charWidth(char.codePointAt(0) ?? 0);
      if (width + w > budget) {
        full = true;
        break;
      }
      width += w;
      kept += char;
    }
    if (full) break;
  }
  return kept + '…' + (styled ? SGR_RESET : '');
}

/**
 * Replace line breaks, tabs and other C0 controls with spaces so the text
 * occupies exactly one terminal line. ESC is kept for escape sequences.
 */
export function toSingleLine(text: string): string {
  return text.replace(/[\x00-\x1a\x1c-\x1f\x7f]/g, ' ');
}

/**
 * Split a message into display lines.
 * Trailing blank lines are dropped; an empty message yields one empty line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
