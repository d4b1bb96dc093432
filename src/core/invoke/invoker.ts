/**
 * Callback registry consulted when a confirmed match is invoked.
 */
import type { OptValue } from '../option/action.js';
import type { OptionSet } from '../option/option-set.js';
import type { Style } from '../style/style.js';

/** What a callback may ask the policy to do next. */
export type InvokeControl = 'continue' | 'stop' | 'quit';

/**
 * Everything a callback receives about one invocation.
 */
export interface InvokeContext {
  readonly uid: number;
  /** Display name of the option, prefix included. */
  readonly name: string;
  readonly style: Style;
  /** The raw argument text handed to the value parser. */
  readonly raw?: string;
  /** The parsed value. */
  readonly value: OptValue;
  /** Values stored for the option before this invocation. */
  readonly prior: readonly OptValue[];
  /** NOA position for positional styles, argument position otherwise. */
  readonly index: number;
  readonly total: number;
  readonly disabled: boolean;
  /** The registry, for reading or adjusting other options. */
  readonly set: OptionSet;
  /** Treat every remaining argument as a NOA. */
  stop(): void;
  /** End the parse successfully after this invocation. */
  quit(): void;
}

/**
 * Returns the value to store, or undefined to refuse the match.
 * Throwing MatchFailure also refuses it and records the failure.
 */
export type InvokeHandler = (ctx: InvokeContext) => OptValue | undefined;

/**
 * Handlers keyed by option uid. Options without a handler store their
 * parsed value unchanged.
 */
export class Invoker {
  private readonly handlers = new Map<number, InvokeHandler>();

  /**
   * Register the handler for an option, replacing any previous one.
   */
  on(uid: number, handler: InvokeHandler): this {
    this.handlers.set(uid, handler);
    return this;
  }

  has(uid: number): boolean {
    return this.handlers.has(uid);
  }

  remove(uid: number): boolean {
    return this.handlers.delete(uid);
  }

  invoke(ctx: InvokeContext): OptValue | undefined {
    const handler = this.handlers.get(ctx.uid);
    return handler ? handler(ctx) : ctx.value;
  }
}
