/**
 * Output Coordinator
 *
 * Owns the terminal for a process: every write to the stream happens
 * inside one exclusive section, in the order the section was acquired.
 * Log lines are written above the progress frame, the frame is redrawn
 * underneath, and prompts hold the section while they wait for input.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type {
  ColorMode,
  LogRecord,
  NonInteractiveProgress,
  PromptPolicy,
  RenderStrategyName,
  TerminalCapabilities,
  TerminalStream,
} from '../models/types.js';
import { DEFAULT_VERBOSITY, shouldEmit, type Severity, type VerbosityLevel } from '../models/severity.js';
import {
  defaultMaxBars,
  detectCapabilities,
  measureWidth,
  resolveColorLevel,
  selectStrategy,
} from '../terminal/capabilities.js';
import { RenderSurface } from '../terminal/RenderSurface.js';
import { ProgressRegistry } from '../progress/ProgressRegistry.js';
import { formatFinalLine } from '../progress/format.js';
import type { ProgressHandle, ProgressOptions, ProgressSnapshot } from '../progress/ProgressHandle.js';
import { createLogger } from '../../shared/utils/debug.js';
import { splitLines, stripAnsi } from '../../shared/utils/text.js';
import { EXIT_SIGINT } from '../../shared/exitCodes.js';
import { ExclusiveSection, type Release } from './ExclusiveSection.js';
import { formatLogRecord } from './format.js';
import { ReadlineLineSource, type LineSource } from './LineSource.js';
import { LineWriter } from './LineWriter.js';
import { Logger, type LogSink } from './Logger.js';
import { ProgressBar, type ProgressDriver } from './ProgressBar.js';
import {
  PromptController,
  type PromptHost,
  type PromptOptions,
  type PromptSession,
  type PromptState,
} from './PromptController.js';

const log = createLogger('output');

type Env = Readonly<Record<string, string | undefined>>;

export interface OutputCoordinatorOptions {
  /** Defaults to process.stdout */
  stream?: TerminalStream;
  /** Prompt input; defaults to process.stdin */
  input?: NodeJS.ReadableStream;
  /** Replaces `input` entirely */
  lineSource?: LineSource;
  env?: Env;
  level?: VerbosityLevel;
  color?: ColorMode;
  /** Defaults to 'no' when CI is set, 'interactive' otherwise */
  promptPolicy?: PromptPolicy;
  /** Minimum time between two frame redraws (default 100) */
  minRenderIntervalMs?: number;
  /** Spinner animation period; 0 disables the timer (default 100) */
  animationIntervalMs?: number;
  /** Minimum time between two milestone lines on plain output (default 5000) */
  milestoneIntervalMs?: number;
  nonInteractiveProgress?: NonInteractiveProgress;
  /** Frame height limit; defaults to a share of the terminal height */
  maxBars?: number;
  /** Skip detection (tests) */
  capabilities?: TerminalCapabilities;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

export interface ExitHooks {
  cleanup: () => void;
}

export function defaultPromptPolicy(env: Env): PromptPolicy {
  return env.CI === 'true' || env.CI === '1' ? 'no' : 'interactive';
}

export class OutputCoordinator implements LogSink, PromptHost, ProgressDriver {
  readonly capabilities: TerminalCapabilities;
  readonly strategy: RenderStrategyName;

  private readonly stream: TerminalStream;
  private readonly paint: ChalkInstance;
  private readonly surface: RenderSurface;
  private readonly registry: ProgressRegistry;
  private readonly section = new ExclusiveSection();
  private readonly lineSource: LineSource;
  private readonly prompts: PromptController;
  private readonly releases = new Map<PromptSession, Release>();
  /** Last milestone text printed per indicator (plain output) */
  private readonly milestones = new Map<number, string>();

  private readonly minRenderIntervalMs: number;
  private readonly animationIntervalMs: number;
  private readonly milestoneIntervalMs: number;
  private readonly nonInteractiveProgress: NonInteractiveProgress;
  private readonly maxBars: number | undefined;

  private currentLevel: VerbosityLevel;
  private displayLines = 0;
  private tick = 0;
  private renderQueued = false;
  private pendingForce = false;
  private animationTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(options: OutputCoordinatorOptions = {}) {
    const env = options.env ?? process.env;
    const stream = options.stream ?? process.stdout;
    this.stream = stream;

    this.capabilities = options.capabilities ?? detectCapabilities(stream, env);
    this.strategy = selectStrategy(this.capabilities);
    this.paint = new Chalk({ level: resolveColorLevel(options.color ?? 'auto', this.capabilities, env) });
    this.surface = new RenderSurface(stream, {
      cursorControl: this.strategy === 'interactive-ansi',
      onDegraded: () => this.handleDegraded(),
    });
    this.registry = new ProgressRegistry({ now: options.now });
    this.lineSource = options.lineSource ?? new ReadlineLineSource(options.input ?? process.stdin);
    this.prompts = new PromptController(this, this.lineSource, options.promptPolicy ?? defaultPromptPolicy(env));

    this.currentLevel = options.level ?? DEFAULT_VERBOSITY;
    this.minRenderIntervalMs = options.minRenderIntervalMs ?? 100;
    this.animationIntervalMs = options.animationIntervalMs ?? 100;
    this.milestoneIntervalMs = options.milestoneIntervalMs ?? 5000;
    this.nonInteractiveProgress = options.nonInteractiveProgress ?? 'milestones';
    this.maxBars = options.maxBars ?? defaultMaxBars(this.capabilities);

    log.debug('Output coordinator created', {
      strategy: this.strategy,
      capabilities: this.capabilities,
      level: this.currentLevel,
    });
  }

  get level(): VerbosityLevel {
    return this.currentLevel;
  }

  /** Verbosity is fixed for the process; changing it is for tests */
  setLevel(level: VerbosityLevel): void {
    this.currentLevel = level;
  }

  get degraded(): boolean {
    return this.surface.degraded;
  }

  /** Terminal lines currently occupied by the progress frame */
  get displayedLines(): number {
    return this.displayLines;
  }

  get promptState(): PromptState {
    return this.prompts.state;
  }

  // ---- Logging ----

  emitLog(record: LogRecord): void {
    if (!shouldEmit(record.severity, this.currentLevel)) {
      return;
    }
    const cleaned: LogRecord = {
      severity: record.severity,
      message: this.clean(record.message),
      scope: record.scope === undefined ? undefined : this.clean(record.scope),
    };
    this.section.run(() => this.writeAboveFrame(formatLogRecord(cleaned, this.paint)));
  }

  /** Plain text, unfiltered except by `off` */
  print(text: string): void {
    if (this.currentLevel === 'off') {
      return;
    }
    const lines = splitLines(this.clean(text));
    this.section.run(() => this.writeAboveFrame(lines));
  }

  logger(scope?: string): Logger {
    return new Logger(this, scope);
  }

  lineWriter(severity: Severity = 'info', scope?: string): LineWriter {
    return new LineWriter(this, { severity, scope });
  }

  // ---- Progress ----

  progress(label: string, options: ProgressOptions = {}): ProgressBar {
    return new ProgressBar(this, this.register(label, options));
  }

  register(label: string, options: ProgressOptions = {}, parent?: ProgressHandle): ProgressHandle {
    const handle = this.registry.register(this.clean(label), {
      ...options,
      message: options.message === undefined ? undefined : this.clean(options.message),
    }, parent);
    this.startAnimation();
    this.requestRender(true);
    return handle;
  }

  advance(handle: ProgressHandle, delta = 1, message?: string): void {
    this.registry.advance(handle, delta);
    if (message !== undefined) {
      this.registry.setMessage(handle, this.clean(message));
    }
    this.requestRender(false);
  }

  set(handle: ProgressHandle, position: number): void {
    this.registry.set(handle, position);
    this.requestRender(false);
  }

  setLabel(handle: ProgressHandle, label: string): void {
    this.registry.setLabel(handle, this.clean(label));
    this.requestRender(false);
  }

  setMessage(handle: ProgressHandle, message: string): void {
    this.registry.setMessage(handle, this.clean(message));
    this.requestRender(false);
  }

  setTotal(handle: ProgressHandle, total: number | undefined): void {
    this.registry.setTotal(handle, total);
    this.requestRender(false);
  }

  finish(handle: ProgressHandle): void {
    if (this.registry.finish(handle)) {
      this.milestones.delete(handle.id);
      this.requestRender(true);
    }
  }

  snapshot(handle: ProgressHandle): ProgressSnapshot {
    return this.registry.snapshot(handle);
  }

  /** Redraw if the rate limit allows it */
  tickRender(): void {
    this.requestRender(false);
  }

  // ---- Prompts ----

  prompt(text: string, options?: PromptOptions): Promise<string | null> {
    return this.prompts.prompt(text, options);
  }

  confirm(message: string, defaultYes = true, signal?: AbortSignal): Promise<boolean> {
    return this.prompts.confirm(message, defaultYes, signal);
  }

  async beginPrompt(text: string): Promise<PromptSession> {
    const release = await this.section.enter();
    const session: PromptSession = { text, answer: null, active: true };
    this.releases.set(session, release);

    if (this.cursorMode) {
      this.surface.clearLines(this.displayLines);
      this.displayLines = 0;
    }
    this.surface.write(this.promptText(text));
    this.surface.flush();
    return session;
  }

  retryPrompt(session: PromptSession, error: string): void {
    if (!session.active) {
      return;
    }
    if (!this.lineSource.isTTY) {
      this.surface.write('\n');
    }
    for (const line of formatLogRecord({ severity: 'error', message: this.clean(error) }, this.paint)) {
      this.surface.writeLine(line);
    }
    this.surface.write(this.promptText(session.text));
    this.surface.flush();
  }

  endPrompt(session: PromptSession): void {
    if (!session.active) {
      return;
    }
    session.active = false;
    const release = this.releases.get(session);
    this.releases.delete(session);

    // Without a terminal echo the answer's newline never reached the screen.
    // shutdownNow() already ended the prompt line.
    if (!this.closed && (session.answer === null || !this.lineSource.isTTY)) {
      this.surface.write('\n');
    }
    if (this.cursorMode) {
      this.drawFrame();
    } else {
      this.retireFinished();
    }
    this.surface.flush();
    release?.();
  }

  // ---- Lifecycle ----

  /**
   * Resolves once all queued output has been written.
   * Rejects with the first error raised by queued work.
   */
  flushed(): Promise<void> {
    return this.section.drained();
  }

  /**
   * Give every active indicator its final line, remove the frame,
   * and stop accepting progress updates.
   */
  shutdown(): Promise<void> {
    this.section.run(() => this.finalize());
    return this.section.drained();
  }

  /**
   * Synchronous shutdown for process exit. Does not wait for a prompt
   * holding the terminal.
   */
  shutdownNow(): void {
    if (!this.section.isHeld) {
      this.section.run(() => this.finalize());
      return;
    }
    if (this.prompts.state === 'prompting') {
      this.surface.write('\n');
    }
    this.finalize();
  }

  /** Restore the terminal on `exit` and Ctrl+C */
  installExitHooks(): ExitHooks {
    const onExit = (): void => this.shutdownNow();
    const onSigint = (): void => {
      this.shutdownNow();
      process.exit(EXIT_SIGINT);
    };
    process.on('exit', onExit);
    process.on('SIGINT', onSigint);
    return {
      cleanup: () => {
        process.removeListener('exit', onExit);
        process.removeListener('SIGINT', onSigint);
      },
    };
  }

  // ---- Rendering (inside the section) ----

  private get cursorMode(): boolean {
    return this.strategy === 'interactive-ansi' && !this.surface.degraded;
  }

  private get barsVisible(): boolean {
    return this.currentLevel !== 'off';
  }

  /** Escapes in caller text only reach a terminal that renders them */
  private clean(text: string): string {
    return this.strategy === 'interactive-ansi' ? text : stripAnsi(text);
  }

  private promptText(text: string): string {
    return this.paint.green(`${this.clean(text)}: `);
  }

  /**
   * Coalesce render requests: while one pass is queued, further requests
   * only upgrade it to a forced pass.
   */
  private requestRender(force: boolean): void {
    if (this.renderQueued) {
      this.pendingForce ||= force;
      return;
    }
    this.renderQueued = true;
    this.pendingForce = force;
    this.section.run(() => {
      const forced = this.pendingForce;
      this.renderQueued = false;
      this.pendingForce = false;
      this.renderPass(forced);
    });
  }

  private renderPass(force: boolean): void {
    if (this.cursorMode) {
      if (!force && !this.registry.hasFinished() && !this.registry.shouldRenderNow(this.minRenderIntervalMs)) {
        return;
      }
      this.surface.clearLines(this.displayLines);
      this.displayLines = 0;
      this.drawFrame();
    } else {
      this.retireFinished();
      this.writeMilestones();
    }
    this.surface.flush();
    if (this.registry.activeCount === 0) {
      this.stopAnimation();
    }
  }

  private writeAboveFrame(lines: readonly string[]): void {
    if (this.cursorMode) {
      this.surface.clearLines(this.displayLines);
      this.displayLines = 0;
      for (const line of lines) {
        this.surface.writeLine(line);
      }
      this.drawFrame();
    } else {
      for (const line of lines) {
        this.surface.writeLine(line);
      }
    }
    this.surface.flush();
  }

  /** Finished lines, then the frame. Expects the old frame already cleared. */
  private drawFrame(): void {
    this.retireFinished();
    if (this.barsVisible) {
      const lines = this.registry.computeFrame({
        width: this.frameWidth(),
        maxLines: this.maxBars,
        tick: this.tick,
        paint: this.paint,
      });
      for (const line of lines) {
        this.surface.writeLine(line);
      }
      this.displayLines = lines.length;
    }
    this.registry.markRendered();
  }

  /** Terminals can be resized between frames */
  private frameWidth(): number | undefined {
    if (!this.capabilities.isInteractive) {
      return this.capabilities.width;
    }
    return measureWidth(this.stream) ?? this.capabilities.width;
  }

  /**
   * Final lines of retired bars. Plain output also gets child bars as they
   * finish; the frame shows those in the parent's tree instead.
   */
  private retireFinished(): void {
    const finished = this.cursorMode
      ? this.registry.collectFinished()
      : [...this.registry.collectFinishedChildren(), ...this.registry.collectFinished()];
    for (const snapshot of finished) {
      this.milestones.delete(snapshot.id);
      const severity: Severity = snapshot.outcome === 'interrupted' ? 'warn' : 'info';
      if (!this.barsVisible || !shouldEmit(severity, this.currentLevel)) {
        continue;
      }
      const line = formatFinalLine(snapshot, this.paint);
      if (line !== null) {
        this.surface.writeLine(line);
      }
    }
  }

  /** Plain progress lines, at most once per milestone interval, only when changed */
  private writeMilestones(): void {
    if (
      this.nonInteractiveProgress !== 'milestones'
      || this.surface.degraded
      || !this.barsVisible
      || !this.registry.shouldRenderNow(this.milestoneIntervalMs)
    ) {
      return;
    }
    for (const snapshot of this.registry.active()) {
      const text = this.registry.describe(snapshot);
      if (this.milestones.get(snapshot.id) !== text) {
        this.surface.writeLine(text);
        this.milestones.set(snapshot.id, text);
      }
    }
    this.registry.markRendered();
  }

  private finalize(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.registry.close();
    this.stopAnimation();
    if (this.cursorMode) {
      this.surface.clearLines(this.displayLines);
      this.displayLines = 0;
    }
    this.retireFinished();
    this.surface.flush();
    this.lineSource.close();
    log.debug('Output coordinator shut down', { degraded: this.surface.degraded });
  }

  private handleDegraded(): void {
    this.displayLines = 0;
    this.stopAnimation();
  }

  // ---- Animation ----

  private startAnimation(): void {
    if (this.animationTimer || this.animationIntervalMs <= 0 || !this.cursorMode) {
      return;
    }
    this.animationTimer = setInterval(() => {
      this.tick++;
      this.requestRender(true);
    }, this.animationIntervalMs);
    this.animationTimer.unref();
  }

  private stopAnimation(): void {
    if (this.animationTimer) {
      clearInterval(this.animationTimer);
      this.animationTimer = null;
    }
  }
}
