/**
 * Scanning and resolution passes shared by every policy.
 */
import { ErrorCodes, MatchFailure, ParseError, type ArgMatchError } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import type { InvokeContext, InvokeControl } from '../invoke/invoker.js';
import { Match } from '../match/match.js';
import { Process } from '../match/process.js';
import type { OptValue } from '../option/action.js';
import type { Opt } from '../option/option.js';
import { guessProcess } from '../style/guess.js';
import { isNoaStyle, type Style } from '../style/style.js';
import { isOptionToken, splitArgument, type OptionToken } from '../token/tokenizer.js';
import { Checker } from './checker.js';
import { FailureLog } from './failure-log.js';
import type { Binding, ParseEnv, ParseResult, Policy, PolicyKind, PolicySettings } from './types.js';

export const DEFAULT_SETTINGS: PolicySettings = {
  strict: true,
  overload: false,
  bareOptions: false,
};

/** A confirmed option match whose callback has not run yet. */
export interface Deferred {
  match: Match;
  binding: Binding;
  raw: string;
}

/** Mutable state of one parse. */
export class RunState {
  readonly failures = new FailureLog();
  readonly bindings: Binding[] = [];
  readonly noa: string[] = [];
  readonly deferred: Deferred[] = [];
  control: InvokeControl = 'continue';

  constructor(
    readonly args: readonly string[],
    readonly env: ParseEnv
  ) {}

  /** A callback asked to end the parse. */
  quitting(): boolean {
    return this.control === 'quit';
  }

  /** A callback asked to end the option scan. */
  stopping(): boolean {
    return this.control === 'stop';
  }

  finish(failure?: ArgMatchError): ParseResult {
    return {
      ok: failure === undefined,
      failure,
      bindings: [...this.bindings],
      noa: [...this.noa],
      failures: this.failures.all(),
    };
  }
}

export function notFound(raw: string, uid?: number): MatchFailure {
  return new MatchFailure(ErrorCodes.OPTION_NOT_FOUND, `Can not find option '${raw}'`, { raw, uid });
}

export abstract class BasePolicy implements Policy {
  abstract readonly kind: PolicyKind;
  readonly settings: PolicySettings;
  protected readonly checker = new Checker();
  protected readonly log: Logger;

  constructor(settings: Partial<PolicySettings> = {}, defaults: PolicySettings = DEFAULT_SETTINGS) {
    this.settings = { ...defaults, ...settings };
    this.log = logger.child('policy');
  }

  /**
   * Resolve `args` (program name first) against the registry.
   *
   * @throws ConfigError when the registry fails its pre-check
   */
  parse(args: readonly string[], env: ParseEnv): ParseResult {
    env.set.reset();
    this.checker.preCheck(env.set);
    const run = new RunState(args, env);
    try {
      return run.finish(this.run(run));
    } catch (error) {
      if (error instanceof ParseError) {
        this.log.debug(`Parse aborted: ${error.message}`);
        return run.finish(error);
      }
      throw error;
    }
  }

  /** The ordered passes of this policy. Returns the terminal failure, if any. */
  protected abstract run(run: RunState): ArgMatchError | undefined;

  /**
   * Hand a confirmed option match to its callback, now or later.
   * Returns false when the match was refused.
   */
  protected abstract confirm(run: RunState, match: Match): boolean;

  protected prefixes(run: RunState): string[] {
    const prefixes = [...run.env.set.prefixes];
    return this.settings.bareOptions ? [...prefixes, ''] : prefixes;
  }

  /**
   * Option pass over every argument. Unresolved tokens become NOAs, or fail
   * the parse in strict mode.
   */
  protected scanOptions(run: RunState): ArgMatchError | undefined {
    const { args } = run;
    const prefixes = this.prefixes(run);
    let index = 0;

    while (index < args.length) {
      const raw = args[index] ?? '';
      const next = index + 1 < args.length ? args[index + 1] : undefined;
      const token = splitArgument(raw, prefixes);

      if (!isOptionToken(token)) {
        run.noa.push(raw);
        index += 1;
        continue;
      }

      const mark = run.failures.size;
      const consume = this.matchToken(run, token, index, next);

      if (consume === undefined) {
        if (this.settings.strict && token.prefix !== '') {
          return run.failures.causeOf(notFound(raw), mark);
        }
        this.log.debug(`Keeping '${raw}' as NOA`);
        run.noa.push(raw);
        index += 1;
        continue;
      }

      index += consume ? 2 : 1;

      if (run.quitting()) {
        return undefined;
      }
      if (run.stopping()) {
        this.log.debug(`Stopped option scan at position ${index}`);
        run.noa.push(...args.slice(index));
        run.control = 'continue';
        return undefined;
      }
    }
    return undefined;
  }

  /**
   * Try each catalog style in order. Returns whether the resolved token
   * consumed the next argument, or undefined when nothing matched.
   */
  protected matchToken(
    run: RunState,
    token: OptionToken,
    index: number,
    next: string | undefined
  ): boolean | undefined {
    for (const style of run.env.styles) {
      const process = guessProcess(style, {
        token,
        next,
        index,
        total: run.args.length,
        overload: this.settings.overload,
      });
      if (!process) continue;
      if (this.resolveOptions(run, process)) {
        this.log.debug(`Matched '${token.raw}' with style ${style}`);
        return process.consume;
      }
    }
    return undefined;
  }

  /**
   * Offer every option to the process. Single and any-mode processes confirm
   * each match as it binds; all-mode processes confirm only once every Match
   * has bound and roll everything back if one confirmation is refused.
   * With `trial` set nothing is confirmed.
   */
  protected resolveOptions(run: RunState, process: Process, trial = false): boolean {
    const { set } = run.env;
    const bindingMark = run.bindings.length;
    const deferredMark = run.deferred.length;

    for (const opt of set.options('opt')) {
      if (process.quit() || process.isExhausted()) break;
      let at = process.process(opt, run.failures);
      while (at !== undefined) {
        const match = process.matches[at];
        if (!trial && process.mode !== 'all' && match && !this.confirm(run, match)) {
          match.reject(set);
          break;
        }
        at = process.process(opt, run.failures);
      }
    }

    if (trial || process.mode !== 'all') {
      return process.isMatched();
    }

    if (!process.isMatched()) {
      process.undo(set);
      return false;
    }
    for (const match of process.matches) {
      if (!this.confirm(run, match)) {
        process.undo(set);
        run.bindings.length = bindingMark;
        run.deferred.length = deferredMark;
        return false;
      }
    }
    return true;
  }

  /**
   * Run the callback for a matched Match and store its result.
   * Pass `binding` to fill a binding recorded at confirmation time.
   */
  protected invoke(run: RunState, match: Match, binding?: Binding): boolean {
    const { uid, value, target } = match;
    if (uid === undefined || value === undefined) {
      return false;
    }
    const { set, invoker } = run.env;
    const opt = set.get(uid);
    const ctx: InvokeContext = {
      uid,
      name: opt.displayName,
      style: target.style,
      raw: target.arg,
      value,
      prior: [...opt.getValues()],
      index: target.index,
      total: target.total,
      disabled: target.disabled,
      set,
      stop: () => {
        if (run.control === 'continue') run.control = 'stop';
      },
      quit: () => {
        run.control = 'quit';
      },
    };

    let result: OptValue | undefined;
    try {
      result = invoker.invoke(ctx);
    } catch (error) {
      if (!(error instanceof MatchFailure)) {
        throw error;
      }
      run.failures.record(
        new MatchFailure(ErrorCodes.INVOKE_FAILED, `Failed to invoke option '${opt.displayName}': ${error.message}`, {
          uid,
          name: opt.displayName,
        }).causedBy(error)
      );
      return false;
    }

    if (result === undefined) {
      this.log.debug(`Callback of '${opt.displayName}' refused '${target.raw}'`);
      return false;
    }

    opt.store(result, target.arg);
    if (binding) {
      binding.value = result;
    } else {
      run.bindings.push(bindingFor(opt, match, result));
    }
    return true;
  }

  /** Command at NOA position 1. */
  protected resolveCmd(run: RunState): void {
    const cmds = run.env.set.options('cmd');
    if (cmds.length === 0 || run.noa.length <= 1) return;
    this.resolveNoa(run, this.noaProcess(run, 'cmd', 1), cmds);
  }

  /** Positionals at NOA positions 1 to total - 1, first success per position. */
  protected resolvePos(run: RunState): void {
    const candidates = run.env.set.options('pos');
    if (candidates.length === 0) return;
    for (let index = 1; index < run.noa.length; index++) {
      this.resolveNoa(run, this.noaProcess(run, 'pos', index), candidates);
      if (run.quitting()) return;
      if (run.stopping()) {
        this.log.debug(`Stopped positional pass at NOA ${index}`);
        run.control = 'continue';
        return;
      }
    }
  }

  /** Every main option, bound to NOA position 0. */
  protected resolveMain(run: RunState): void {
    for (const opt of run.env.set.options('main')) {
      this.resolveNoa(run, this.noaProcess(run, 'main', 0), [opt]);
      if (run.quitting()) return;
    }
  }

  private noaProcess(run: RunState, style: Style, index: number): Process {
    const text = run.noa[index];
    return new Process(style).add(
      new Match(
        {
          style,
          name: text,
          arg: text,
          consume: false,
          disabled: false,
          index,
          total: run.noa.length,
          raw: text ?? '',
        },
        true
      )
    );
  }

  private resolveNoa(run: RunState, process: Process, candidates: Opt[]): boolean {
    const { set } = run.env;
    for (const opt of candidates) {
      if (process.quit()) break;
      const at = process.process(opt, run.failures);
      if (at === undefined) continue;
      const match = process.matches[at];
      if (match && !this.invoke(run, match)) {
        match.reject(set);
      }
    }
    return process.isMatched();
  }
}

export function bindingFor(opt: Opt, match: Match, value: OptValue): Binding {
  const { target } = match;
  return {
    uid: opt.uid,
    name: opt.displayName,
    style: target.style,
    index: isNoaStyle(target.style) ? target.index : undefined,
    value,
    raw: target.arg,
  };
}
