/**
 * Pre policy: a trial scan finds the first NOA naming a sub-parser; the
 * arguments before it are resolved like Forward and the rest is delegated.
 */
import { ParseError } from '../../utils/errors.js';
import { guessProcess } from '../style/guess.js';
import { isOptionToken, splitArgument, type OptionToken } from '../token/tokenizer.js';
import { DEFAULT_SETTINGS, RunState } from './base.js';
import { ForwardPolicy } from './forward.js';
import type { ParseEnv, ParseResult, PolicyKind, PolicySettings, SubParserEntry } from './types.js';

export const PRE_SETTINGS: PolicySettings = { ...DEFAULT_SETTINGS, strict: false };

interface Boundary {
  index: number;
  entry: SubParserEntry;
}

export class PrePolicy extends ForwardPolicy {
  readonly kind: PolicyKind = 'pre';

  constructor(settings: Partial<PolicySettings> = {}) {
    super(settings, PRE_SETTINGS);
  }

  parse(args: readonly string[], env: ParseEnv): ParseResult {
    const boundary = this.findBoundary(args, env);
    if (!boundary) {
      return super.parse(args, env);
    }

    const head = super.parse(args.slice(0, boundary.index), env);
    const remainingTokens = args.slice(boundary.index);
    this.log.debug(`Delegating ${remainingTokens.length} argument(s) to '${boundary.entry.name}'`);
    const result = boundary.entry.parse(remainingTokens);

    return {
      ...head,
      ok: head.ok && result.ok,
      failure: head.failure ?? result.failure,
      delegation: {
        boundaryIndex: boundary.index,
        subParser: boundary.entry.name,
        remainingTokens,
        result,
      },
    };
  }

  /**
   * Walk the arguments without invoking anything. Tokens that resolve to an
   * option are skipped (with their consumed argument); the first remaining
   * argument naming a sub-parser is the boundary.
   */
  private findBoundary(args: readonly string[], env: ParseEnv): Boundary | undefined {
    const lookup = env.subParsers;
    if (!lookup) return undefined;

    env.set.reset();
    const run = new RunState(args, env);
    const prefixes = this.prefixes(run);
    let index = 1;

    try {
      while (index < args.length) {
        const raw = args[index] ?? '';
        const next = index + 1 < args.length ? args[index + 1] : undefined;
        const token = splitArgument(raw, prefixes);

        if (isOptionToken(token)) {
          const consume = this.probe(run, token, index, next);
          if (consume !== undefined) {
            index += consume ? 2 : 1;
            continue;
          }
          if (token.prefix !== '') {
            index += 1;
            continue;
          }
        }

        const entry = lookup.find(raw);
        if (entry) {
          return { index, entry };
        }
        index += 1;
      }
      return undefined;
    } finally {
      env.set.reset();
    }
  }

  /** Like matchToken, but every binding is undone right away. */
  private probe(run: RunState, token: OptionToken, index: number, next: string | undefined): boolean | undefined {
    for (const style of run.env.styles) {
      const process = guessProcess(style, {
        token,
        next,
        index,
        total: run.args.length,
        overload: this.settings.overload,
      });
      if (!process) continue;

      let matched: boolean;
      try {
        matched = this.resolveOptions(run, process, true);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        // the real pass reports it
        process.undo(run.env.set);
        return undefined;
      }
      const consume = process.consume;
      process.undo(run.env.set);
      if (matched) return consume;
    }
    return undefined;
  }
}
