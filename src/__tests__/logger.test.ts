/**
 * Tests for Logger, LineWriter and log line formatting
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { Logger, type LogSink } from '../core/output/Logger.js';
import { LineWriter } from '../core/output/LineWriter.js';
import { formatLogRecord } from '../core/output/format.js';
import type { LogRecord } from '../core/models/types.js';

class RecordingSink implements LogSink {
  readonly records: LogRecord[] = [];
  readonly printed: string[] = [];

  emitLog(record: LogRecord): void {
    this.records.push(record);
  }

  print(text: string): void {
    this.printed.push(text);
  }
}

describe('Logger', () => {
  it('should attach its scope to every record', () => {
    const sink = new RecordingSink();
    const logger = new Logger(sink, 'build');

    logger.info('compiling');
    logger.error('failed');

    expect(sink.records).toEqual([
      { severity: 'info', message: 'compiling', scope: 'build' },
      { severity: 'error', message: 'failed', scope: 'build' },
    ]);
  });

  it('should leave the scope out when there is none', () => {
    const sink = new RecordingSink();

    new Logger(sink).trace('x');

    expect(sink.records).toEqual([{ severity: 'trace', message: 'x' }]);
  });

  it('should nest child scopes', () => {
    const sink = new RecordingSink();
    const child = new Logger(sink, 'build').child('tsc');

    child.warn('slow');

    expect(child.scope).toBe('build/tsc');
    expect(sink.records).toEqual([{ severity: 'warn', message: 'slow', scope: 'build/tsc' }]);
  });

  it('should forward print unchanged', () => {
    const sink = new RecordingSink();

    new Logger(sink, 'a').print('raw text');

    expect(sink.printed).toEqual(['raw text']);
    expect(sink.records).toEqual([]);
  });
});

describe('LineWriter', () => {
  it('should emit complete lines only', () => {
    const sink = new RecordingSink();
    const writer = new LineWriter(sink, { severity: 'info', scope: 'npm' });

    writer.writeChunk('added 12 ');
    expect(sink.records).toEqual([]);

    writer.writeChunk('packages\r\naudited');
    expect(sink.records).toEqual([{ severity: 'info', message: 'added 12 packages', scope: 'npm' }]);

    writer.flush();
    expect(sink.records.map((r) => r.message)).toEqual(['added 12 packages', 'audited']);
  });

  it('should not emit anything on flush when the buffer is empty', () => {
    const sink = new RecordingSink();
    const writer = new LineWriter(sink, { severity: 'debug' });

    writer.writeChunk('one\n\n');
    writer.flush();

    expect(sink.records).toEqual([
      { severity: 'debug', message: 'one' },
      { severity: 'debug', message: '' },
    ]);
  });
});

describe('formatLogRecord', () => {
  const plain = new Chalk({ level: 0 });

  it('should prefix the severity label and scope', () => {
    expect(formatLogRecord({ severity: 'warn', message: 'disk low', scope: 'fs' }, plain))
      .toEqual(['[WARN][fs] disk low']);
  });

  it('should continue extra lines under a gutter', () => {
    expect(formatLogRecord({ severity: 'error', message: 'failed\nat step 2\n' }, plain))
      .toEqual(['[ERROR] failed', '  | at step 2']);
  });

  it('should print the label alone for an empty message', () => {
    expect(formatLogRecord({ severity: 'info', message: '' }, plain)).toEqual(['[INFO]']);
  });

  it('should color the whole line by severity', () => {
    const colored = new Chalk({ level: 1 });
    expect(formatLogRecord({ severity: 'error', message: 'x' }, colored))
      .toEqual(['\x1b[31m[ERROR] x\x1b[39m']);
  });
});
