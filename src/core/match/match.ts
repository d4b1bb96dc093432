/**
 * A single attempt to bind a token-derived candidate to one option.
 */
import { ErrorCodes, MatchFailure, ParseError } from '../../utils/errors.js';
import type { OptValue } from '../option/action.js';
import type { Opt, OptSnapshot } from '../option/option.js';
import type { OptionSet } from '../option/option-set.js';
import type { Style } from '../style/style.js';

/** Receives recoverable failures raised while matching. */
export interface FailureSink {
  record(failure: MatchFailure): void;
}

/** What a Match tries to bind. */
export interface MatchTarget {
  style: Style;
  /** Prefix for option styles; absent for positional styles. */
  prefix?: string;
  /** Option name, or the NOA text for positional styles. */
  name?: string;
  /** Raw value handed to the option's value parser. */
  arg?: string;
  /** Whether the value is the next raw argument. */
  consume: boolean;
  disabled: boolean;
  /** Argument position for option styles, NOA position for positional styles. */
  index: number;
  total: number;
  /** The raw argument this target came from. */
  raw: string;
}

type MatchState = 'pending' | 'matched' | 'rejected';

export class Match {
  private state: MatchState = 'pending';
  private boundUid: number | undefined;
  private snapshot: OptSnapshot | undefined;
  private parsed: OptValue | undefined;

  /**
   * @param overload - when false, the first option that recognises the
   *   target but rejects it settles the match; no other option is tried
   */
  constructor(
    readonly target: MatchTarget,
    private readonly overload = false
  ) {}

  /** Uid of the bound option while matched. */
  get uid(): number | undefined {
    return this.boundUid;
  }

  /** Parsed value while matched. */
  get value(): OptValue | undefined {
    return this.parsed;
  }

  isMatched(): boolean {
    return this.state === 'matched';
  }

  /** Matched, or rejected with overloading disabled. */
  isSettled(): boolean {
    return this.state !== 'pending';
  }

  /**
   * Whether `opt` is addressed by this target, ignoring its value.
   */
  accepts(opt: Opt): boolean {
    const { style, prefix, name, index, total } = this.target;

    if (!opt.supportsStyle(style)) {
      return false;
    }

    switch (style) {
      case 'main':
        return true;
      case 'pos':
        return opt.matchIndex(index, total);
      case 'cmd':
        return (
          name !== undefined &&
          (opt.matchName(undefined, name) || opt.matchAlias(undefined, name)) &&
          opt.matchIndex(index, total)
        );
      default:
        return name !== undefined && (opt.matchName(prefix, name) || opt.matchAlias(prefix, name));
    }
  }

  /**
   * Try to bind `opt`. On success the option is marked as needing an
   * invocation; on failure the option is left untouched.
   *
   * @throws ParseError when the target is deactivated and `opt` is not deactivatable
   */
  process(opt: Opt, failures: FailureSink): boolean {
    if (this.isSettled() || !this.accepts(opt)) {
      return false;
    }

    const { style, arg, consume, disabled } = this.target;

    if (disabled && !opt.deactivatable) {
      throw new ParseError(
        ErrorCodes.DEACTIVATE_NOT_SUPPORTED,
        `Option '${opt.displayName}' does not support deactivate style`,
        { uid: opt.uid, name: opt.displayName, raw: this.target.raw }
      );
    }

    if (consume && arg === undefined) {
      failures.record(
        new MatchFailure(ErrorCodes.MISSING_ARGUMENT, `Missing argument for option '${opt.displayName}'`, {
          uid: opt.uid,
          name: opt.displayName,
        })
      );
      this.settleRejected();
      return false;
    }

    let value: OptValue;
    try {
      value = opt.parse(arg, style, disabled);
    } catch (error) {
      if (!(error instanceof MatchFailure)) {
        throw error;
      }
      failures.record(error);
      this.settleRejected();
      return false;
    }

    this.snapshot = opt.snapshot();
    opt.markPending();
    this.boundUid = opt.uid;
    this.parsed = value;
    this.state = 'matched';
    return true;
  }

  /**
   * Roll back a successful match after its invocation was refused.
   * With overloading disabled the match is settled as rejected.
   */
  reject(set: OptionSet): void {
    this.undo(set);
    this.settleRejected();
  }

  /**
   * Restore the bound option to its pre-match state. No-op when unmatched.
   */
  undo(set: OptionSet): void {
    if (this.state !== 'matched' || this.boundUid === undefined || !this.snapshot) {
      return;
    }
    set.get(this.boundUid).restore(this.snapshot);
    this.boundUid = undefined;
    this.snapshot = undefined;
    this.parsed = undefined;
    this.state = 'pending';
  }

  private settleRejected(): void {
    if (!this.overload) {
      this.state = 'rejected';
    }
  }
}

