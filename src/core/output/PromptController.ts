/**
 * Prompt Controller
 *
 * Idle -> Prompting -> Idle. The terminal section is held from the moment
 * the prompt is written until the answer (or end of input) arrives, so
 * logs and redraws from other tasks queue behind it. A second prompt
 * waits its turn instead of failing.
 */

import type { PromptPolicy } from '../models/types.js';
import { PromptNotAllowedError } from '../../shared/utils/error.js';
import { createLogger } from '../../shared/utils/debug.js';
import type { LineSource } from './LineSource.js';

const log = createLogger('prompt');

export type PromptState = 'idle' | 'prompting';

/** One prompt interaction; lives for a single prompt call */
export interface PromptSession {
  readonly text: string;
  answer: string | null;
  active: boolean;
}

/** Terminal side of a prompt, implemented by the coordinator */
export interface PromptHost {
  beginPrompt(text: string): Promise<PromptSession>;
  /** Report a rejected answer and show the prompt again, still holding the terminal */
  retryPrompt(session: PromptSession, error: string): void;
  endPrompt(session: PromptSession): void;
}

export interface PromptOptions {
  /** Returns an error message to re-ask, or undefined to accept */
  validate?: (answer: string) => string | undefined;
  signal?: AbortSignal;
}

type YesNo = 'yes' | 'no' | 'default' | 'invalid';

export function parseYesNo(answer: string): YesNo {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return 'default';
  if (normalized === 'y' || normalized === 'yes') return 'yes';
  if (normalized === 'n' || normalized === 'no') return 'no';
  return 'invalid';
}

export const YES_NO_ERROR = 'please enter yes or no';

export class PromptController {
  private current: PromptState = 'idle';

  constructor(
    private readonly host: PromptHost,
    private readonly lines: LineSource,
    private readonly policy: PromptPolicy,
  ) {}

  get state(): PromptState {
    return this.current;
  }

  /**
   * Ask for one line of input.
   * @returns the line, or null when no input is available
   */
  async prompt(text: string, options: PromptOptions = {}): Promise<string | null> {
    if (this.policy === 'no') {
      throw new PromptNotAllowedError(text);
    }

    const session = await this.host.beginPrompt(text);
    this.current = 'prompting';
    log.debug('Prompt started', { text });

    try {
      for (;;) {
        const line = await this.lines.readLine(options.signal);
        session.answer = line;
        if (line === null) {
          return null;
        }
        const error = options.validate?.(line);
        if (error === undefined) {
          return line;
        }
        this.host.retryPrompt(session, error);
      }
    } finally {
      this.current = 'idle';
      this.host.endPrompt(session);
      log.debug('Prompt ended', { text, answered: session.answer !== null });
    }
  }

  /**
   * Yes/no question. Empty input and end of input take the default;
   * anything unrecognised is asked again.
   */
  async confirm(message: string, defaultYes = true, signal?: AbortSignal): Promise<boolean> {
    if (this.policy === 'yes') {
      return true;
    }
    const hint = defaultYes ? '[Y/n]' : '[y/N]';
    const answer = await this.prompt(`${message} ${hint}`, {
      validate: (value) => (parseYesNo(value) === 'invalid' ? YES_NO_ERROR : undefined),
      signal,
    });
    if (answer === null) {
      return defaultYes;
    }
    const parsed = parseYesNo(answer);
    if (parsed === 'yes') return true;
    if (parsed === 'no') return false;
    return defaultYes;
  }
}
