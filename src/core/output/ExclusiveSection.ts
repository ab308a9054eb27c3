/**
 * FIFO async lock guarding the terminal.
 *
 * Short tasks run synchronously when the section is free and queue
 * otherwise. Long holders (prompts) enter() and keep the section across
 * awaits until they call the returned release function.
 */

import { toError } from '../../shared/utils/error.js';

export type Release = () => void;

type Waiter =
  | { kind: 'task'; task: () => void }
  | { kind: 'holder'; grant: (release: Release) => void };

interface DrainWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class ExclusiveSection {
  private held = false;
  private readonly waiting: Waiter[] = [];
  private readonly drainWaiters: DrainWaiter[] = [];
  private firstError: Error | null = null;

  get isHeld(): boolean {
    return this.held;
  }

  /** Number of tasks and holders queued behind the current owner */
  get pending(): number {
    return this.waiting.length;
  }

  /**
   * Run a task inside the section. Errors it throws are kept for
   * drained() rather than thrown at the caller.
   */
  run(task: () => void): void {
    if (this.held) {
      this.waiting.push({ kind: 'task', task });
      return;
    }
    this.held = true;
    this.execute(task);
    this.releaseNext();
  }

  /**
   * Take the section for an open-ended interaction.
   * When the section is free it is taken before this returns.
   */
  enter(): Promise<Release> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiting.push({ kind: 'holder', grant: resolve });
    });
  }

  /**
   * Resolves once everything queued so far has run and the section is free.
   * Rejects with the first error a task threw since the last drain.
   */
  drained(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.drainWaiters.push({ resolve, reject });
      if (!this.held) {
        this.settleDrainWaiters();
      }
    });
  }

  private execute(task: () => void): void {
    try {
      task();
    } catch (err) {
      this.firstError ??= toError(err);
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.releaseNext();
    };
  }

  /** Hand the section to waiters in order; iterative so long queues cannot overflow the stack */
  private releaseNext(): void {
    let next = this.waiting.shift();
    while (next !== undefined) {
      if (next.kind === 'holder') {
        next.grant(this.createRelease());
        return;
      }
      this.execute(next.task);
      next = this.waiting.shift();
    }
    this.held = false;
    this.settleDrainWaiters();
  }

  private settleDrainWaiters(): void {
    if (this.drainWaiters.length === 0) return;
    const waiters = this.drainWaiters.splice(0);
    const error = this.firstError;
    this.firstError = null;
    for (const waiter of waiters) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve();
      }
    }
  }
}
