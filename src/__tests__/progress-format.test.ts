/**
 * Tests for progress line layout
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import {
  describeProgress,
  formatBytes,
  formatChildLine,
  formatChildOverflowLine,
  formatFinalLine,
  formatFrameLine,
  formatOverflowLine,
  formatPercentage,
  spinnerGlyph,
} from '../core/progress/format.js';
import type { ProgressSnapshot } from '../core/progress/ProgressHandle.js';
import { EtaEstimator } from '../core/progress/eta.js';

const plain = new Chalk({ level: 0 });

function snapshot(overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot {
  return {
    id: 1,
    label: 'fetch',
    message: '',
    position: 2,
    total: 8,
    finished: false,
    outcome: null,
    keep: true,
    doneMessage: undefined,
    interruptedMessage: undefined,
    showPercentage: true,
    bytes: false,
    parentId: null,
    ...overrides,
  };
}

describe('describeProgress', () => {
  it('should lay out counter, label, percentage and message', () => {
    expect(describeProgress(snapshot({ message: 'downloading' }), null)).toBe('[2/8] fetch: 25.00% downloading');
  });

  it('should include the ETA between percentage and message', () => {
    expect(describeProgress(snapshot({ message: 'x' }), 1.5)).toBe('[2/8] fetch: 25.00% ETA 1.50s; x');
  });

  it('should drop the separator when nothing follows the label', () => {
    expect(describeProgress(snapshot({ showPercentage: false }), null)).toBe('[2/8] fetch');
  });

  it('should work without a label', () => {
    expect(describeProgress(snapshot({ label: '' }), null)).toBe('[2/8] 25.00%');
  });

  it('should put line breaks in label and message on one line', () => {
    expect(describeProgress(snapshot({ label: 'co\rpy', message: 'a.txt\nb.txt' }), null))
      .toBe('[2/8] co py: 25.00% a.txt b.txt');
  });

  it('should show label and message for indeterminate indicators', () => {
    expect(describeProgress(snapshot({ total: undefined, message: 'waiting' }), null)).toBe('fetch: waiting');
    expect(describeProgress(snapshot({ total: undefined, label: '', message: 'waiting' }), null)).toBe('waiting');
  });
});

describe('byte bars', () => {
  it('should format SI sizes with one truncated decimal', () => {
    expect(formatBytes(999)).toBe('999B');
    expect(formatBytes(1500)).toBe('1.5k');
    expect(formatBytes(1999)).toBe('1.9k');
    expect(formatBytes(3_000_000)).toBe('3.0M');
    expect(formatBytes(2_750_000_000)).toBe('2.7G');
  });

  it('should show amounts instead of the counter', () => {
    const bar = snapshot({ bytes: true, label: 'download', position: 1500, total: 3_000_000, message: 'a.bin' });
    expect(describeProgress(bar, null)).toBe('download: 1.5k / 3.0M 0.05% a.bin');
    expect(describeProgress(snapshot({ bytes: true, total: undefined, position: 2048 }), null)).toBe('fetch: 2.0k');
  });

  it('should append the amount to the final line', () => {
    const done = snapshot({ bytes: true, label: 'upload', position: 2048, total: 2048, outcome: 'done' });
    expect(formatFinalLine(done, plain)).toBe('✓ upload: done (2.0k / 2.0k)');
    const spinner = snapshot({ bytes: true, label: 'upload', position: 999, total: undefined, outcome: 'done' });
    expect(formatFinalLine(spinner, plain)).toBe('✓ upload: done (999B)');
  });
});

describe('formatPercentage', () => {
  it('should use two decimals until complete', () => {
    expect(formatPercentage(1, 3)).toBe('33.33%');
    expect(formatPercentage(3, 3)).toBe('100%');
  });
});

describe('formatFrameLine', () => {
  it('should truncate the description to the terminal width', () => {
    expect(formatFrameLine('[1/4] compile-everything: 25.00%', '⠋', plain, 20)).toBe('⠋ [1/4] compile-ev…');
  });

  it('should leave short lines alone', () => {
    expect(formatFrameLine('[1/4] ok', '⠙', plain, 20)).toBe('⠙ [1/4] ok');
  });

  it('should count emoji as two columns when truncating', () => {
    expect(formatFrameLine('🚀'.repeat(12), '⠋', plain, 20)).toBe(`⠋ ${'🚀'.repeat(8)}…`);
  });

  it('should close a styled label cut by truncation', () => {
    expect(formatFrameLine('\x1b[31mredlabel\x1b[0m', '⠋', plain, 8)).toBe('⠋ \x1b[31mredl…\x1b[0m');
  });
});

describe('child lines', () => {
  it('should draw tree guides before the text', () => {
    expect(formatChildLine('[2/9] compile: 22.22%', '', true, plain)).toBe('  └ [2/9] compile: 22.22%');
    expect(formatChildLine('lint', '', false, plain)).toBe('  ├ lint');
    expect(formatChildLine('obj', '│ ', true, plain)).toBe('  │ └ obj');
  });

  it('should truncate to the width left after the guides', () => {
    expect(formatChildLine('abcdefghijklmnopq', '│ ', false, plain, 20)).toBe('  │ ├ abcdefghijkl…');
  });

  it('should summarise hidden children', () => {
    expect(formatChildOverflowLine(2, '', plain)).toBe('  └ ... and 2 more');
  });
});

describe('formatFinalLine', () => {
  it('should print the done line with the counter', () => {
    expect(formatFinalLine(snapshot({ position: 8, outcome: 'done' }), plain)).toBe('✓ [8/8] fetch: done');
  });

  it('should use a custom done message', () => {
    const done = snapshot({ position: 8, outcome: 'done', doneMessage: 'fetched 8 files' });
    expect(formatFinalLine(done, plain)).toBe('✓ [8/8] fetched 8 files');
  });

  it('should print nothing for a completed bar that is not kept', () => {
    expect(formatFinalLine(snapshot({ position: 8, outcome: 'done', keep: false }), plain)).toBeNull();
  });

  it('should always print interrupted lines', () => {
    expect(formatFinalLine(snapshot({ outcome: 'interrupted', keep: false }), plain)).toBe('✗ [2/8] fetch: interrupted');
    const custom = snapshot({ outcome: 'interrupted', interruptedMessage: 'fetch cancelled' });
    expect(formatFinalLine(custom, plain)).toBe('✗ [2/8] fetch cancelled');
  });

  it('should omit the counter for spinners', () => {
    expect(formatFinalLine(snapshot({ total: undefined, outcome: 'done' }), plain)).toBe('✓ fetch: done');
    expect(formatFinalLine(snapshot({ total: undefined, label: '', outcome: 'done' }), plain)).toBe('✓ done');
  });

  it('should color done lines green', () => {
    const colored = new Chalk({ level: 1 });
    expect(formatFinalLine(snapshot({ position: 8, outcome: 'done' }), colored))
      .toBe('\x1b[32m✓ [8/8] fetch: done\x1b[39m');
  });
});

describe('spinner and overflow', () => {
  it('should cycle through the spinner frames', () => {
    expect(spinnerGlyph(0)).toBe('⠋');
    expect(spinnerGlyph(11)).toBe('⠙');
    expect(spinnerGlyph(-1)).toBe('⠏');
  });

  it('should count hidden indicators', () => {
    expect(formatOverflowLine(3, plain)).toBe('  ... and 3 more');
  });
});

describe('EtaEstimator', () => {
  it('should wait for the settle period before estimating', () => {
    const eta = new EtaEstimator();
    expect(eta.update(0, 0, 10)).toBeNull();
    expect(eta.update(200, 2, 10)).toBeNull();
    expect(eta.update(1000, 5, 10)).toBe(1);
  });

  it('should report nothing when complete and restart after a reset', () => {
    const eta = new EtaEstimator();
    eta.update(0, 0, 10);
    expect(eta.update(1000, 10, 10)).toBeNull();
    expect(eta.update(1000, 4, 10)).toBe(1.5);
    expect(eta.update(1500, 2, 10)).toBeNull();
  });
});
