/**
 * In-process stand-ins for the terminal and the prompt input.
 */

import type { TerminalCapabilities, TerminalStream } from '../../core/models/types.js';
import type { LineSource } from '../../core/output/LineSource.js';
import { OutputCoordinator, type OutputCoordinatorOptions } from '../../core/output/OutputCoordinator.js';

export interface MemoryTerminalOptions {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
}

/** Records every chunk written to it; can be told to fail */
export class MemoryTerminal implements TerminalStream {
  readonly chunks: string[] = [];
  readonly isTTY: boolean;
  /** Writable to simulate a resize */
  columns: number | undefined;
  readonly rows: number | undefined;

  private nextThrow: Error | null = null;
  private nextCallbackError: Error | null = null;
  private readonly errorListeners: Array<(error: Error) => void> = [];

  constructor(options: MemoryTerminalOptions = {}) {
    this.isTTY = options.isTTY ?? false;
    this.columns = options.columns;
    this.rows = options.rows;
  }

  write(chunk: string, callback?: (error?: Error | null) => void): boolean {
    if (this.nextThrow) {
      const error = this.nextThrow;
      this.nextThrow = null;
      throw error;
    }
    if (this.nextCallbackError) {
      const error = this.nextCallbackError;
      this.nextCallbackError = null;
      callback?.(error);
      return false;
    }
    this.chunks.push(chunk);
    callback?.(null);
    return true;
  }

  on(_event: 'error', listener: (error: Error) => void): this {
    this.errorListeners.push(listener);
    return this;
  }

  /** The next write throws synchronously */
  failNextWrite(error = new Error('EPIPE')): void {
    this.nextThrow = error;
  }

  /** The next write reports an error through its callback */
  failNextCallback(error = new Error('EPIPE')): void {
    this.nextCallbackError = error;
  }

  emitError(error = new Error('EPIPE')): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  get output(): string {
    return this.chunks.join('');
  }
}

/** Line source fed by the test; null stands for end of input */
export class QueueLineSource implements LineSource {
  isTTY = false;
  closed = false;
  private readonly queued: Array<string | null> = [];
  private readonly waiters: Array<(line: string | null) => void> = [];

  push(line: string | null): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      this.queued.push(line);
    }
  }

  readLine(signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.queued.length > 0) {
      return Promise.resolve(this.queued.shift() ?? null);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const waiter = (line: string | null): void => resolve(line);
      this.waiters.push(waiter);
      signal?.addEventListener('abort', () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
          resolve(null);
        }
      }, { once: true });
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}

export interface FakeClock {
  now: () => number;
  set(ms: number): void;
}

export function createClock(start = 0): FakeClock {
  let current = start;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
  };
}

export const ANSI_CAPABILITIES: TerminalCapabilities = { isInteractive: true, supportsAnsi: true };
export const PIPE_CAPABILITIES: TerminalCapabilities = { isInteractive: false, supportsAnsi: false };

export interface TestHarness {
  terminal: MemoryTerminal;
  lines: QueueLineSource;
  clock: FakeClock;
  output: OutputCoordinator;
}

/**
 * Coordinator over a memory terminal with a manual clock,
 * no colors and no animation timer.
 */
export function createHarness(options: OutputCoordinatorOptions = {}): TestHarness {
  const terminal = new MemoryTerminal();
  const lines = new QueueLineSource();
  const clock = createClock();
  const output = new OutputCoordinator({
    stream: terminal,
    lineSource: lines,
    capabilities: ANSI_CAPABILITIES,
    color: 'never',
    animationIntervalMs: 0,
    promptPolicy: 'interactive',
    env: {},
    now: clock.now,
    ...options,
  });
  return { terminal, lines, clock, output };
}

/** Let pending promise continuations run */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Frame-clearing sequence for `count` lines */
export function clear(count: number): string {
  return '\r' + '\x1b[1A\x1b[2K'.repeat(count);
}
