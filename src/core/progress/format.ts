/**
 * Text layout for progress lines.
 *
 *   [current/total] label: percentage ETA s.ss; message
 *   label: 1.5k / 3.0M percentage ETA s.ss; message      (byte bars)
 *
 * Indeterminate indicators show `label: message` next to the spinner.
 * Child bars hang under their parent:
 *
 *   ⠋ [1/3] build: 33.33%
 *     ├ ✓ [4/4] lint: done
 *     └ [2/9] compile: 22.22%
 */

import type { ChalkInstance } from 'chalk';
import { getDisplayWidth, toSingleLine, truncateText } from '../../shared/utils/text.js';
import type { ProgressSnapshot } from './ProgressHandle.js';

/** Spinner frames (Braille dots pattern) */
export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

export const DONE_MARK = '✓';
export const INTERRUPTED_MARK = '✗';

export const TREE_BRANCH = '├';
export const TREE_LAST = '└';
export const TREE_PIPE = '│';

const BYTE_UNITS = [
  [1_000_000_000_000, 'T'],
  [1_000_000_000, 'G'],
  [1_000_000, 'M'],
  [1_000, 'k'],
] as const;

/** SI byte count with one truncated decimal: 1500 -> `1.5k`, 999 -> `999B` */
export function formatBytes(bytes: number): string {
  for (const [unit, suffix] of BYTE_UNITS) {
    if (bytes >= unit) {
      const whole = Math.floor(bytes / unit);
      const tenths = Math.floor(((bytes % unit) * 10) / unit);
      return `${whole}.${tenths}${suffix}`;
    }
  }
  return `${bytes}B`;
}

/** Frame glyph for a render tick; never derived from wall-clock time */
export function spinnerGlyph(tick: number): string {
  const count = SPINNER_FRAMES.length;
  return SPINNER_FRAMES[((tick % count) + count) % count] ?? SPINNER_FRAMES[0];
}

export function formatPercentage(position: number, total: number): string {
  if (position >= total) {
    return '100%';
  }
  return `${((position * 100) / total).toFixed(2)}%`;
}

function counter(snapshot: ProgressSnapshot): string {
  return snapshot.total === undefined ? '' : `[${snapshot.position}/${snapshot.total}]`;
}

function etaText(etaSeconds: number): string {
  return `ETA ${etaSeconds.toFixed(2)}s;`;
}

function describeBytes(snapshot: ProgressSnapshot, etaSeconds: number | null): string {
  const { label, message, total, position } = snapshot;
  const tail = [total === undefined ? formatBytes(position) : `${formatBytes(position)} / ${formatBytes(total)}`];
  if (total !== undefined && snapshot.showPercentage) {
    tail.push(formatPercentage(position, total));
  }
  if (etaSeconds !== null) {
    tail.push(etaText(etaSeconds));
  }
  if (message) {
    tail.push(message);
  }
  return label ? `${label}: ${tail.join(' ')}` : tail.join(' ');
}

function describeCount(snapshot: ProgressSnapshot, etaSeconds: number | null): string {
  const { label, message, total, position } = snapshot;

  if (total === undefined) {
    if (label && message) return `${label}: ${message}`;
    return label || message;
  }

  const tail: string[] = [];
  if (snapshot.showPercentage) {
    tail.push(formatPercentage(position, total));
  }
  if (etaSeconds !== null) {
    tail.push(etaText(etaSeconds));
  }
  if (message) {
    tail.push(message);
  }

  let text = counter(snapshot);
  if (label) {
    text += ` ${label}`;
  }
  if (tail.length > 0) {
    text += (label ? ': ' : ' ') + tail.join(' ');
  }
  return text;
}

/**
 * Description of an active indicator, without the spinner glyph.
 * Always a single terminal line.
 * @param etaSeconds - remaining time, or null to omit
 */
export function describeProgress(snapshot: ProgressSnapshot, etaSeconds: number | null): string {
  const text = snapshot.bytes ? describeBytes(snapshot, etaSeconds) : describeCount(snapshot, etaSeconds);
  return toSingleLine(text);
}

/**
 * One frame line: glyph, space, description truncated so the line never
 * reaches the last terminal column.
 */
export function formatFrameLine(
  description: string,
  glyph: string,
  paint: ChalkInstance,
  width?: number,
): string {
  const text = width === undefined ? description : truncateText(description, width - 3);
  return `${paint.cyan(glyph)} ${text}`;
}

function finalText(snapshot: ProgressSnapshot, text: string): string {
  if (snapshot.bytes) {
    const amount = snapshot.total === undefined
      ? formatBytes(snapshot.position)
      : `${formatBytes(snapshot.position)} / ${formatBytes(snapshot.total)}`;
    return `${text} (${amount})`;
  }
  return snapshot.total === undefined ? text : `${counter(snapshot)} ${text}`;
}

/**
 * Line left behind when an indicator finishes.
 * Returns null for completed indicators that are not kept.
 */
export function formatFinalLine(snapshot: ProgressSnapshot, paint: ChalkInstance): string | null {
  if (snapshot.outcome === 'interrupted') {
    const text = snapshot.interruptedMessage
      ?? (snapshot.label ? `${snapshot.label}: interrupted` : 'interrupted');
    return paint.yellow(toSingleLine(`${INTERRUPTED_MARK} ${finalText(snapshot, text)}`));
  }

  if (!snapshot.keep) {
    return null;
  }
  const text = snapshot.doneMessage ?? (snapshot.label ? `${snapshot.label}: done` : 'done');
  return paint.green(toSingleLine(`${DONE_MARK} ${finalText(snapshot, text)}`));
}

/**
 * Line of a child bar: tree guides, then text truncated to what the
 * guides leave of the width.
 * @param hierarchy - guides of the ancestors below the top level
 */
export function formatChildLine(
  text: string,
  hierarchy: string,
  last: boolean,
  paint: ChalkInstance,
  width?: number,
): string {
  const guides = `${hierarchy}${last ? TREE_LAST : TREE_BRANCH}`;
  const fitted = width === undefined ? text : truncateText(text, width - 4 - getDisplayWidth(guides));
  return `  ${paint.gray(guides)} ${fitted}`;
}

export function formatChildOverflowLine(hidden: number, hierarchy: string, paint: ChalkInstance): string {
  return `  ${paint.gray(`${hierarchy}${TREE_LAST}`)} ... and ${hidden} more`;
}

export function formatOverflowLine(hidden: number, paint: ChalkInstance): string {
  return paint.gray(`  ... and ${hidden} more`);
}
