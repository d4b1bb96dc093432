/**
 * A resolution unit: the Matches for one token under one user style, or for
 * one positional slot.
 */
import type { Opt } from '../option/option.js';
import type { OptionSet } from '../option/option-set.js';
import type { Style } from '../style/style.js';
import type { FailureSink, Match } from './match.js';

/**
 * - `single`: one Match
 * - `any`: first Match to succeed resolves the process (embedded-value-plus)
 * - `all`: every Match must succeed (combined-option)
 */
export type ProcessMode = 'single' | 'any' | 'all';

export class Process {
  private readonly items: Match[] = [];

  constructor(
    readonly style: Style,
    readonly mode: ProcessMode = 'single'
  ) {}

  add(match: Match): this {
    this.items.push(match);
    return this;
  }

  get matches(): readonly Match[] {
    return this.items;
  }

  /** Whether a resolved process swallows the next raw argument. */
  get consume(): boolean {
    return this.items.some((match) => match.isMatched() && match.target.consume);
  }

  /**
   * Offer `opt` to each unresolved Match in order and stop at the first one
   * that binds it. Returns that Match's position.
   */
  process(opt: Opt, failures: FailureSink): number | undefined {
    if (this.quit()) {
      return undefined;
    }
    for (const [at, match] of this.items.entries()) {
      if (match.process(opt, failures)) {
        return at;
      }
    }
    return undefined;
  }

  isMatched(): boolean {
    if (this.items.length === 0) {
      return false;
    }
    return this.mode === 'all'
      ? this.items.every((match) => match.isMatched())
      : this.items.some((match) => match.isMatched());
  }

  /** True once the process is fully resolved and needs no more options. */
  quit(): boolean {
    return this.isMatched();
  }

  /** True once no Match can bind any further option. */
  isExhausted(): boolean {
    return this.items.every((match) => match.isSettled());
  }

  /**
   * Undo every matched Match, most recent first.
   */
  undo(set: OptionSet): void {
    for (const match of [...this.items].reverse()) {
      match.undo(set);
    }
  }
}
