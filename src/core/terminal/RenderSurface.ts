/**
 * Buffered writer over a terminal stream.
 *
 * Primitives are only called from inside the coordinator's exclusive
 * section. Everything buffered during one pass reaches the stream in a
 * single write, so another process sharing the terminal never sees half
 * a frame.
 */

import type { TerminalStream } from '../models/types.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorMessage, toError } from '../../shared/utils/error.js';
import { clearLinesSequence } from './ansi.js';

const log = createLogger('render-surface');

export interface RenderSurfaceOptions {
  /** Whether cursor movement sequences may be emitted */
  cursorControl: boolean;
  /** Called once, on the first write failure */
  onDegraded?: (error: Error) => void;
}

export class RenderSurface {
  private buffer = '';
  private degradedState = false;
  private failures = 0;
  private readonly cursorControl: boolean;
  private readonly onDegraded: ((error: Error) => void) | undefined;

  constructor(
    private readonly stream: TerminalStream,
    options: RenderSurfaceOptions,
  ) {
    this.cursorControl = options.cursorControl;
    this.onDegraded = options.onDegraded;
    stream.on?.('error', (error) => this.degrade(error));
  }

  /** Sticky: once a write has failed, the surface stays degraded */
  get degraded(): boolean {
    return this.degradedState;
  }

  /** Number of write failures seen, including those after degradation */
  get failureCount(): number {
    return this.failures;
  }

  get hasCursorControl(): boolean {
    return this.cursorControl && !this.degradedState;
  }

  /** Erase the `count` lines above the cursor */
  clearLines(count: number): void {
    if (count <= 0 || !this.hasCursorControl) {
      return;
    }
    this.buffer += clearLinesSequence(count);
  }

  writeLine(text: string): void {
    this.buffer += text + '\n';
  }

  /** Buffer text without a trailing newline */
  write(text: string): void {
    this.buffer += text;
  }

  /** Hand the buffered text to the stream in one write call */
  flush(): void {
    if (this.buffer === '') {
      return;
    }
    const chunk = this.buffer;
    this.buffer = '';
    try {
      this.stream.write(chunk, (error) => {
        if (error) {
          this.degrade(error);
        }
      });
    } catch (err) {
      this.degrade(toError(err));
    }
  }

  private degrade(error: Error): void {
    this.failures++;
    if (this.degradedState) {
      log.debug('Write failed on degraded surface', { error: getErrorMessage(error) });
      return;
    }
    this.degradedState = true;
    log.error('Terminal write failed, degrading to plain output', { error: getErrorMessage(error) });
    this.onDegraded?.(error);
  }
}
