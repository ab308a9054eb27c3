/**
 * Line-oriented input for prompts.
 *
 * One readline interface is kept for the coordinator's lifetime so that
 * lines arriving together (piped input) are not lost between prompts.
 * The input is paused whenever nobody is waiting for a line.
 */

import * as readline from 'node:readline';

export interface LineSource {
  /** Whether the user's typing is echoed by a terminal */
  readonly isTTY: boolean;
  /** Next line without its terminator, or null at end of input or on abort */
  readLine(signal?: AbortSignal): Promise<string | null>;
  close(): void;
}

type LineWaiter = (line: string | null) => void;

export class ReadlineLineSource implements LineSource {
  private rl: readline.Interface | null = null;
  private readonly buffered: string[] = [];
  private readonly waiters: LineWaiter[] = [];
  private ended = false;

  constructor(private readonly input: NodeJS.ReadableStream = process.stdin) {}

  get isTTY(): boolean {
    return 'isTTY' in this.input && this.input.isTTY === true;
  }

  readLine(signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) {
      return Promise.resolve(null);
    }
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    const rl = this.ensureInterface();
    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        this.pauseIfIdle();
        resolve(null);
      };
      const waiter: LineWaiter = (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
      rl.resume();
    });
  }

  close(): void {
    if (this.rl) {
      this.rl.close();
      return;
    }
    this.end();
  }

  private ensureInterface(): readline.Interface {
    if (this.rl) {
      return this.rl;
    }
    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on('line', (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
      this.pauseIfIdle();
    });
    rl.on('close', () => this.end());
    this.rl = rl;
    return rl;
  }

  private pauseIfIdle(): void {
    if (this.waiters.length === 0 && this.rl && !this.ended) {
      this.rl.pause();
    }
  }

  private end(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
