/**
 * Caller-facing progress bar bound to one coordinator.
 */

import type { ProgressHandle, ProgressOptions, ProgressSnapshot } from '../progress/ProgressHandle.js';

/** Coordinator operations a bar forwards to */
export interface ProgressDriver {
  register(label: string, options?: ProgressOptions, parent?: ProgressHandle): ProgressHandle;
  advance(handle: ProgressHandle, delta?: number, message?: string): void;
  set(handle: ProgressHandle, position: number): void;
  setLabel(handle: ProgressHandle, label: string): void;
  setMessage(handle: ProgressHandle, message: string): void;
  setTotal(handle: ProgressHandle, total: number | undefined): void;
  finish(handle: ProgressHandle): void;
  snapshot(handle: ProgressHandle): ProgressSnapshot;
}

export class ProgressBar {
  constructor(
    private readonly driver: ProgressDriver,
    readonly handle: ProgressHandle,
  ) {}

  /** Step forward; an optional message replaces the current one */
  advance(delta = 1, message?: string): void {
    this.driver.advance(this.handle, delta, message);
  }

  set(position: number): void {
    this.driver.set(this.handle, position);
  }

  setLabel(label: string): void {
    this.driver.setLabel(this.handle, label);
  }

  setMessage(message: string): void {
    this.driver.setMessage(this.handle, message);
  }

  setTotal(total: number | undefined): void {
    this.driver.setTotal(this.handle, total);
  }

  finish(): void {
    this.driver.finish(this.handle);
  }

  /**
   * Start a bar drawn under this one. Child bars are not kept once done
   * unless `keep` says so; finishing this bar interrupts the ones still running.
   */
  child(label: string, options: ProgressOptions = {}): ProgressBar {
    return new ProgressBar(this.driver, this.driver.register(label, options, this.handle));
  }

  get finished(): boolean {
    return this.handle.finished;
  }

  get position(): number {
    return this.driver.snapshot(this.handle).position;
  }

  get total(): number | undefined {
    return this.driver.snapshot(this.handle).total;
  }

  /**
   * Run `work` and finish the bar afterwards, whether it resolves or throws.
   */
  async track<T>(work: (bar: ProgressBar) => Promise<T>): Promise<T> {
    try {
      return await work(this);
    } finally {
      this.finish();
    }
  }
}
