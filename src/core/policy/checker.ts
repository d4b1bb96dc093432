/**
 * Registry-wide checks run around the matching passes.
 */
import { ConfigError, ErrorCodes, MatchFailure } from '../../utils/errors.js';
import type { Opt } from '../option/option.js';
import type { OptionSet } from '../option/option-set.js';

function failure(code: string, label: string, opts: Opt[]): MatchFailure {
  const names = opts.map((opt) => opt.displayName);
  const details: Record<string, unknown> = { names };
  const [only] = opts;
  if (opts.length === 1 && only) {
    details.uid = only.uid;
  }
  return new MatchFailure(code, `${label} '${names.join(' | ')}' is force required`, details);
}

export class Checker {
  /**
   * A force-required positional that can bind position 1 conflicts with
   * commands, which always occupy that position.
   *
   * @throws ConfigError
   */
  preCheck(set: OptionSet): void {
    if (!set.has('cmd')) return;
    const conflicting = set
      .options('pos')
      .filter((opt) => opt.force && opt.matchIndex(1, Number.MAX_SAFE_INTEGER));
    if (conflicting.length > 0) {
      throw new ConfigError(
        ErrorCodes.POS_CONFLICTS_CMD,
        'Can not have force required POS at position 1 when a CMD exists',
        { names: conflicting.map((opt) => opt.displayName) }
      );
    }
  }

  /** Every force-required option matched. */
  optCheck(set: OptionSet): MatchFailure | undefined {
    const missing = set.options('opt').filter((opt) => !opt.isValid());
    return missing.length > 0 ? failure(ErrorCodes.OPT_FORCE_REQUIRED, 'Option', missing) : undefined;
  }

  /** When commands are registered and any is force-required, one matched. */
  cmdCheck(set: OptionSet): MatchFailure | undefined {
    const cmds = set.options('cmd');
    if (cmds.length === 0 || cmds.some((opt) => opt.matched)) return undefined;
    const forced = cmds.filter((opt) => opt.force);
    return forced.length > 0 ? failure(ErrorCodes.CMD_FORCE_REQUIRED, 'CMD', forced) : undefined;
  }

  /** Every force-required positional matched. */
  posCheck(set: OptionSet): MatchFailure | undefined {
    const missing = set.options('pos').filter((opt) => !opt.isValid());
    return missing.length > 0 ? failure(ErrorCodes.POS_FORCE_REQUIRED, 'POS', missing) : undefined;
  }

  /** Every force-required main matched. */
  postCheck(set: OptionSet): MatchFailure | undefined {
    const missing = set.options('main').filter((opt) => !opt.isValid());
    return missing.length > 0 ? failure(ErrorCodes.MAIN_FORCE_REQUIRED, 'MAIN', missing) : undefined;
  }
}
