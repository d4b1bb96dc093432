/**
 * Forward policy: callbacks fire as soon as a match is confirmed.
 */
import type { ArgMatchError } from '../../utils/errors.js';
import type { Match } from '../match/match.js';
import { BasePolicy, type RunState } from './base.js';
import type { PolicyKind } from './types.js';

export class ForwardPolicy extends BasePolicy {
  readonly kind: PolicyKind = 'forward';

  protected run(run: RunState): ArgMatchError | undefined {
    const { set } = run.env;
    const { failures } = run;

    const scanFailure = this.scanOptions(run);
    if (scanFailure) return scanFailure;
    if (run.quitting()) return undefined;

    const optFailure = this.checker.optCheck(set);
    if (optFailure) return failures.causeOf(optFailure);

    this.resolveCmd(run);
    if (run.quitting()) return undefined;
    const cmdFailure = this.checker.cmdCheck(set);
    if (cmdFailure) return failures.causeOf(cmdFailure);

    this.resolvePos(run);
    if (run.quitting()) return undefined;
    const posFailure = this.checker.posCheck(set);
    if (posFailure) return failures.causeOf(posFailure);

    this.resolveMain(run);
    if (run.quitting()) return undefined;
    const mainFailure = this.checker.postCheck(set);
    return mainFailure ? failures.causeOf(mainFailure) : undefined;
  }

  protected confirm(run: RunState, match: Match): boolean {
    return this.invoke(run, match);
  }
}
