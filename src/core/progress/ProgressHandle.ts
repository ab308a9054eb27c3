import type { ProgressRegistry } from './ProgressRegistry.js';
import type { EtaEstimator } from './eta.js';

export type ProgressOutcome = 'done' | 'interrupted';

/** Options accepted when a progress indicator is registered */
export interface ProgressOptions {
  /** Unset means indeterminate (spinner) */
  total?: number;
  message?: string;
  /** Print a done line when the bar completes (default true; false for child bars) */
  keep?: boolean;
  /** Replaces `<label>: done` */
  doneMessage?: string;
  /** Replaces `<label>: interrupted` */
  interruptedMessage?: string;
  /** Show the percentage for bounded bars (default true) */
  showPercentage?: boolean;
  /** Show a remaining-time estimate for bounded bars (default false) */
  eta?: boolean;
  /** Total and position count bytes, shown as `1.5k / 3.0M` */
  bytes?: boolean;
  /** Children shown under this bar before `... and N more` (default unlimited) */
  maxChildren?: number;
}

/** Mutable per-indicator state, owned by the registry */
export interface ProgressState {
  readonly id: number;
  label: string;
  message: string;
  position: number;
  total: number | undefined;
  /** Set once; a finished handle is never mutated again */
  outcome: ProgressOutcome | null;
  readonly keep: boolean;
  readonly doneMessage: string | undefined;
  readonly interruptedMessage: string | undefined;
  readonly showPercentage: boolean;
  readonly eta: EtaEstimator | null;
  readonly bytes: boolean;
  readonly maxChildren: number | undefined;
  readonly parent: ProgressState | null;
  /** Child bars in creation order, finished ones included until the root retires */
  readonly children: ProgressState[];
  /** Final line already handed to plain output */
  reported: boolean;
}

/** Read-only copy of an indicator's state */
export interface ProgressSnapshot {
  id: number;
  label: string;
  message: string;
  position: number;
  total: number | undefined;
  finished: boolean;
  outcome: ProgressOutcome | null;
  keep: boolean;
  doneMessage: string | undefined;
  interruptedMessage: string | undefined;
  showPercentage: boolean;
  bytes: boolean;
  /** Id of the parent bar, or null for a top-level bar */
  parentId: number | null;
}

/**
 * Opaque reference to one indicator.
 * Only the registry that created it accepts it.
 */
export class ProgressHandle {
  constructor(
    readonly registry: ProgressRegistry,
    /** @internal */
    readonly state: ProgressState,
  ) {}

  get id(): number {
    return this.state.id;
  }

  get finished(): boolean {
    return this.state.outcome !== null;
  }
}

export function snapshotOf(state: ProgressState): ProgressSnapshot {
  return {
    id: state.id,
    label: state.label,
    message: state.message,
    position: state.position,
    total: state.total,
    finished: state.outcome !== null,
    outcome: state.outcome,
    keep: state.keep,
    doneMessage: state.doneMessage,
    interruptedMessage: state.interruptedMessage,
    showPercentage: state.showPercentage,
    bytes: state.bytes,
    parentId: state.parent === null ? null : state.parent.id,
  };
}
