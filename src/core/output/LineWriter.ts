/**
 * Line-buffered writer for streamed output.
 *
 * Output of child processes arrives in arbitrary chunks. Only complete
 * lines are forwarded, each as its own log record, so a partial line
 * never lands in the middle of a frame redraw.
 */

import type { Severity } from '../models/severity.js';
import type { LogSink } from './Logger.js';

export interface LineWriterOptions {
  severity: Severity;
  scope?: string;
}

export class LineWriter {
  private lineBuffer = '';

  constructor(
    private readonly sink: LogSink,
    private readonly options: LineWriterOptions,
  ) {}

  /**
   * Buffer a chunk and emit every complete line in it.
   * The trailing partial line stays buffered until the next chunk or flush().
   */
  writeChunk(text: string): void {
    const combined = this.lineBuffer + text;
    const parts = combined.split('\n');
    this.lineBuffer = parts.pop() ?? '';

    for (const part of parts) {
      this.emit(part.endsWith('\r') ? part.slice(0, -1) : part);
    }
  }

  /** Emit the buffered partial line, if any */
  flush(): void {
    if (this.lineBuffer === '') {
      return;
    }
    const line = this.lineBuffer;
    this.lineBuffer = '';
    this.emit(line);
  }

  private emit(line: string): void {
    const { severity, scope } = this.options;
    this.sink.emitLog(scope === undefined ? { severity, message: line } : { severity, message: line, scope });
  }
}
