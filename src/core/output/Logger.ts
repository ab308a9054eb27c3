import type { Severity } from '../models/severity.js';
import type { LogRecord } from '../models/types.js';

/** Sink a Logger forwards to; the coordinator implements it */
export interface LogSink {
  emitLog(record: LogRecord): void;
  print(text: string): void;
}

/** Scoped logging facade handed to concurrent workers */
export class Logger {
  constructor(
    private readonly sink: LogSink,
    readonly scope?: string,
  ) {}

  trace(message: string): void {
    this.log('trace', message);
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  log(severity: Severity, message: string): void {
    this.sink.emitLog(
      this.scope === undefined ? { severity, message } : { severity, message, scope: this.scope },
    );
  }

  /** Plain output, shown unless verbosity is off */
  print(text: string): void {
    this.sink.print(text);
  }

  /** Nested scope, rendered as `[parent/child]` */
  child(scope: string): Logger {
    return new Logger(this.sink, this.scope ? `${this.scope}/${scope}` : scope);
  }
}
