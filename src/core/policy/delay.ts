/**
 * Delay policy: option callbacks wait until every argument is scanned and
 * the positionals are resolved. Options flagged `nodelay` still fire at once.
 */
import type { ArgMatchError } from '../../utils/errors.js';
import type { Match } from '../match/match.js';
import { BasePolicy, bindingFor, notFound, type RunState } from './base.js';
import type { Binding, PolicyKind } from './types.js';

export class DelayPolicy extends BasePolicy {
  readonly kind: PolicyKind = 'delay';

  protected run(run: RunState): ArgMatchError | undefined {
    const { set } = run.env;
    const { failures } = run;

    const scanFailure = this.scanOptions(run);
    if (scanFailure) return scanFailure;
    if (run.quitting()) return undefined;

    this.resolveCmd(run);
    if (run.quitting()) return undefined;
    const cmdFailure = this.checker.cmdCheck(set);
    if (cmdFailure) return failures.causeOf(cmdFailure);

    this.resolvePos(run);
    if (run.quitting()) return undefined;

    const flushFailure = this.flush(run);
    if (flushFailure) return flushFailure;
    if (run.quitting()) return undefined;

    const optFailure = this.checker.optCheck(set);
    if (optFailure) return failures.causeOf(optFailure);
    const posFailure = this.checker.posCheck(set);
    if (posFailure) return failures.causeOf(posFailure);

    this.resolveMain(run);
    if (run.quitting()) return undefined;
    const mainFailure = this.checker.postCheck(set);
    return mainFailure ? failures.causeOf(mainFailure) : undefined;
  }

  /**
   * Queue the callback, recording the binding now so the log keeps
   * confirmation order.
   */
  protected confirm(run: RunState, match: Match): boolean {
    const { uid, value } = match;
    if (uid === undefined || value === undefined) {
      return false;
    }
    const opt = run.env.set.get(uid);
    if (opt.nodelay) {
      return this.invoke(run, match);
    }
    const binding = bindingFor(opt, match, value);
    run.bindings.push(binding);
    run.deferred.push({ match, binding, raw: match.target.raw });
    return true;
  }

  /**
   * Invoke queued callbacks in confirmation order. A refused callback drops
   * its binding and, in strict mode, fails the parse. After a `stop()` the
   * rest of the queue is dropped unmatched.
   */
  private flush(run: RunState): ArgMatchError | undefined {
    const queue = run.deferred.splice(0);
    this.log.debug(`Flushing ${queue.length} deferred invocation(s)`);

    for (const [at, { match, binding, raw }] of queue.entries()) {
      if (!this.invoke(run, match, binding)) {
        this.drop(run, binding);
        if (this.settings.strict) {
          return run.failures.causeOf(notFound(raw, binding.uid));
        }
      }
      if (run.quitting()) return undefined;
      if (run.stopping()) {
        const skipped = queue.slice(at + 1);
        this.log.debug(`Stopped flush, skipping ${skipped.length} invocation(s)`);
        for (const rest of skipped) this.drop(run, rest.binding);
        run.control = 'continue';
        return undefined;
      }
    }
    return undefined;
  }

  /** Forget a queued binding whose callback did not store a value. */
  private drop(run: RunState, binding: Binding): void {
    run.env.set.get(binding.uid).clearPending();
    const at = run.bindings.indexOf(binding);
    if (at >= 0) run.bindings.splice(at, 1);
  }
}
