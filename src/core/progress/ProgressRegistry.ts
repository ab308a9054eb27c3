/**
 * Progress Registry
 *
 * Holds the active indicators in creation order, the render rate-limit
 * clock, and computes frames. Mutations are synchronous; rendering is
 * the coordinator's job.
 *
 * Child bars render under their parent. A finished child stays in the
 * parent's tree (unless it completed and is not kept) until the top-level
 * bar retires; a finished parent interrupts its unfinished children.
 */

import type { ChalkInstance } from 'chalk';
import { InvalidHandleError } from '../../shared/utils/error.js';
import { EtaEstimator } from './eta.js';
import {
  describeProgress,
  formatChildLine,
  formatChildOverflowLine,
  formatFinalLine,
  formatFrameLine,
  formatOverflowLine,
  spinnerGlyph,
  TREE_PIPE,
} from './format.js';
import {
  ProgressHandle,
  snapshotOf,
  type ProgressOptions,
  type ProgressSnapshot,
  type ProgressState,
} from './ProgressHandle.js';

export interface ProgressRegistryOptions {
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export interface FrameOptions {
  /** Terminal width in columns; unset disables truncation */
  width?: number;
  /** Maximum indicator lines before an overflow line is shown */
  maxLines?: number;
  /** Render tick selecting the spinner glyph */
  tick: number;
  paint: ChalkInstance;
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function clamp(position: number, total: number | undefined): number {
  return total === undefined ? position : Math.min(position, total);
}

function interruptChildren(state: ProgressState): void {
  for (const child of state.children) {
    if (child.outcome === null) {
      child.outcome = 'interrupted';
      interruptChildren(child);
    }
  }
}

export class ProgressRegistry {
  private readonly states = new Map<number, ProgressState>();
  private readonly now: () => number;
  private nextId = 1;
  private closed = false;
  private lastRenderAt: number | null = null;

  constructor(options: ProgressRegistryOptions = {}) {
    this.now = options.now ?? (() => performance.now());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @param parent - bar to hang this one under; it must not be finished
   */
  register(label: string, options: ProgressOptions = {}, parent?: ProgressHandle): ProgressHandle {
    if (this.closed) {
      throw new InvalidHandleError('cannot register progress after shutdown');
    }
    if (options.total !== undefined) {
      assertCount('total', options.total);
    }
    if (options.maxChildren !== undefined) {
      assertCount('maxChildren', options.maxChildren);
    }
    const parentState = parent === undefined ? null : this.owned(parent);
    if (parentState !== null && parentState.outcome !== null) {
      throw new InvalidHandleError(`progress handle ${parentState.id} is finished and cannot take children`);
    }
    const state: ProgressState = {
      id: this.nextId++,
      label,
      message: options.message ?? '',
      position: 0,
      total: options.total,
      outcome: null,
      keep: options.keep ?? parentState === null,
      doneMessage: options.doneMessage,
      interruptedMessage: options.interruptedMessage,
      showPercentage: options.showPercentage ?? true,
      eta: options.eta ? new EtaEstimator() : null,
      bytes: options.bytes ?? false,
      maxChildren: options.maxChildren,
      parent: parentState,
      children: [],
      reported: false,
    };
    this.states.set(state.id, state);
    parentState?.children.push(state);
    return new ProgressHandle(this, state);
  }

  advance(handle: ProgressHandle, delta = 1): void {
    const state = this.mutable(handle);
    assertCount('delta', delta);
    if (!state) return;
    state.position = clamp(state.position + delta, state.total);
  }

  /** Explicit reset; the only way a position may decrease */
  set(handle: ProgressHandle, position: number): void {
    const state = this.mutable(handle);
    assertCount('position', position);
    if (!state) return;
    state.position = clamp(position, state.total);
  }

  setLabel(handle: ProgressHandle, label: string): void {
    const state = this.mutable(handle);
    if (!state) return;
    state.label = label;
  }

  setMessage(handle: ProgressHandle, message: string): void {
    const state = this.mutable(handle);
    if (!state) return;
    state.message = message;
  }

  /** Set a total learned later; undefined turns the bar into a spinner */
  setTotal(handle: ProgressHandle, total: number | undefined): void {
    const state = this.mutable(handle);
    if (total !== undefined) {
      assertCount('total', total);
    }
    if (!state) return;
    state.total = total;
    state.position = clamp(state.position, total);
  }

  /**
   * Mark an indicator finished. Idempotent, also after shutdown.
   * A bounded bar short of its total finishes as interrupted.
   * @returns true when this call finished the indicator
   */
  finish(handle: ProgressHandle): boolean {
    const state = this.owned(handle);
    if (state.outcome !== null) {
      return false;
    }
    const complete = state.total === undefined || state.position >= state.total;
    state.outcome = complete ? 'done' : 'interrupted';
    interruptChildren(state);
    if (state.parent !== null && state.outcome === 'done' && !state.keep) {
      this.detach(state);
    }
    return true;
  }

  snapshot(handle: ProgressHandle): ProgressSnapshot {
    return snapshotOf(this.owned(handle));
  }

  /** Snapshots of unfinished indicators, each parent followed by its children */
  active(): ProgressSnapshot[] {
    const result: ProgressSnapshot[] = [];
    const visit = (state: ProgressState): void => {
      if (state.outcome !== null) return;
      result.push(snapshotOf(state));
      state.children.forEach(visit);
    };
    this.activeRoots().forEach(visit);
    return result;
  }

  get activeCount(): number {
    let count = 0;
    for (const state of this.states.values()) {
      if (state.outcome === null) count++;
    }
    return count;
  }

  /** Whether a top-level indicator is waiting to be retired */
  hasFinished(): boolean {
    for (const state of this.states.values()) {
      if (state.parent === null && state.outcome !== null) return true;
    }
    return false;
  }

  /**
   * Remove finished top-level indicators, with their children, and return
   * them in creation order.
   */
  collectFinished(): ProgressSnapshot[] {
    const finished: ProgressSnapshot[] = [];
    for (const state of this.states.values()) {
      if (state.parent === null && state.outcome !== null) {
        finished.push(snapshotOf(state));
        this.forget(state);
      }
    }
    return finished;
  }

  /**
   * Finished child bars not handed out before, in creation order.
   * Plain output prints these as they happen; the frame keeps them in the tree.
   */
  collectFinishedChildren(): ProgressSnapshot[] {
    const finished: ProgressSnapshot[] = [];
    for (const state of this.states.values()) {
      if (state.parent !== null && state.outcome !== null && !state.reported) {
        state.reported = true;
        finished.push(snapshotOf(state));
      }
    }
    return finished;
  }

  /** Description of an active indicator, updating its ETA estimate */
  describe(snapshot: ProgressSnapshot): string {
    const estimator = this.states.get(snapshot.id)?.eta ?? null;
    const eta = estimator !== null && snapshot.total !== undefined
      ? estimator.update(this.now(), snapshot.position, snapshot.total)
      : null;
    return describeProgress(snapshot, eta);
  }

  /**
   * Frame lines: each active top-level bar followed by its tree of children.
   * `maxLines` limits the number of top-level bars shown.
   */
  computeFrame(options: FrameOptions): string[] {
    const roots = this.activeRoots();
    const limit = options.maxLines;
    const shown = limit !== undefined && roots.length > limit ? roots.slice(0, limit) : roots;
    const glyph = spinnerGlyph(options.tick);

    const lines: string[] = [];
    for (const root of shown) {
      lines.push(formatFrameLine(this.describe(snapshotOf(root)), glyph, options.paint, options.width));
      this.appendChildren(lines, root, '', options);
    }
    const hidden = roots.length - shown.length;
    if (hidden > 0) {
      lines.push(formatOverflowLine(hidden, options.paint));
    }
    return lines;
  }

  private appendChildren(lines: string[], parent: ProgressState, hierarchy: string, options: FrameOptions): void {
    const { children, maxChildren } = parent;
    const shown = maxChildren !== undefined && children.length > maxChildren
      ? children.slice(0, maxChildren)
      : children;
    const hidden = children.length - shown.length;

    shown.forEach((child, index) => {
      const last = hidden === 0 && index === shown.length - 1;
      const snapshot = snapshotOf(child);
      const text = child.outcome === null ? this.describe(snapshot) : formatFinalLine(snapshot, options.paint);
      if (text === null) return;
      lines.push(formatChildLine(text, hierarchy, last, options.paint, options.width));
      if (child.outcome === null) {
        this.appendChildren(lines, child, hierarchy + (last ? '  ' : `${TREE_PIPE} `), options);
      }
    });
    if (hidden > 0) {
      lines.push(formatChildOverflowLine(hidden, hierarchy, options.paint));
    }
  }

  shouldRenderNow(minIntervalMs: number): boolean {
    return this.lastRenderAt === null || this.now() - this.lastRenderAt >= minIntervalMs;
  }

  markRendered(): void {
    this.lastRenderAt = this.now();
  }

  /**
   * Stop accepting updates. Unfinished indicators become interrupted
   * and are returned by the next collectFinished().
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const state of this.states.values()) {
      if (state.outcome === null) {
        state.outcome = 'interrupted';
      }
    }
  }

  private activeRoots(): ProgressState[] {
    const roots: ProgressState[] = [];
    for (const state of this.states.values()) {
      if (state.parent === null && state.outcome === null) {
        roots.push(state);
      }
    }
    return roots;
  }

  /** Drop a completed, not-kept child from its parent's tree */
  private detach(state: ProgressState): void {
    const siblings = state.parent?.children;
    if (siblings) {
      siblings.splice(siblings.indexOf(state), 1);
    }
    this.forget(state);
  }

  private forget(state: ProgressState): void {
    this.states.delete(state.id);
    state.children.forEach((child) => this.forget(child));
  }

  private owned(handle: ProgressHandle): ProgressState {
    if (handle.registry !== this) {
      throw new InvalidHandleError(`progress handle ${handle.id} belongs to another registry`);
    }
    return handle.state;
  }

  /** State to mutate, or null when the indicator already finished */
  private mutable(handle: ProgressHandle): ProgressState | null {
    const state = this.owned(handle);
    if (this.closed) {
      throw new InvalidHandleError(`progress handle ${handle.id} used after shutdown`);
    }
    return state.outcome === null ? state : null;
  }
}
