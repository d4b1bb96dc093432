/**
 * Parser facade: an option registry, its callbacks, a style catalog, a policy
 * and the sub-parsers a Pre policy may delegate to.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { Invoker, type InvokeHandler } from '../invoke/invoker.js';
import type { OptValue } from '../option/action.js';
import type { Opt } from '../option/option.js';
import { OptionSet, type OptionSpec } from '../option/option-set.js';
import { createPolicy } from '../policy/index.js';
import type { ParseResult, Policy, PolicyKind, PolicySettings, SubParserEntry } from '../policy/types.js';
import { StyleCatalog, type UserStyle } from '../style/style.js';

const log = logger.child('parser');

export interface ParserOptions {
  /** Policy kind, or a ready policy instance. Defaults to forward. */
  policy?: PolicyKind | Policy;
  prefixes?: Iterable<string>;
  styles?: Iterable<UserStyle>;
  strict?: boolean;
  overload?: boolean;
  bareOptions?: boolean;
}

export class Parser implements SubParserEntry {
  readonly set: OptionSet;
  readonly styles: StyleCatalog;
  readonly invoker = new Invoker();
  readonly policy: Policy;
  private readonly subParsers = new Map<string, Parser>();

  constructor(
    readonly name: string = 'app',
    options: ParserOptions = {}
  ) {
    this.set = new OptionSet(options.prefixes);
    this.styles = new StyleCatalog(options.styles);

    const settings: Partial<PolicySettings> = {};
    if (options.strict !== undefined) settings.strict = options.strict;
    if (options.overload !== undefined) settings.overload = options.overload;
    if (options.bareOptions !== undefined) settings.bareOptions = options.bareOptions;

    this.policy =
      typeof options.policy === 'object' ? options.policy : createPolicy(options.policy ?? 'forward', settings);
  }

  /**
   * Register an option from a declaration string or spec. Returns its uid.
   *
   * @example
   * const uid = parser.add('--count;-c=i', { action: 'app' });
   */
  add(spec: OptionSpec | string, overrides?: Partial<OptionSpec>): number {
    return this.set.add(spec, overrides);
  }

  /**
   * Attach a callback to an option.
   */
  on(uid: number, handler: InvokeHandler): this {
    this.set.get(uid); // throws for unknown uids
    this.invoker.on(uid, handler);
    return this;
  }

  /**
   * Register a sub-parser under its own name and any aliases.
   */
  addSubParser(parser: Parser, aliases: string[] = []): this {
    for (const name of [parser.name, ...aliases]) {
      if (this.subParsers.has(name)) {
        throw new ConfigError(ErrorCodes.DUPLICATE_SUBPARSER, `Sub-parser name '${name}' is already registered`, {
          name,
        });
      }
    }
    for (const name of [parser.name, ...aliases]) {
      this.subParsers.set(name, parser);
    }
    return this;
  }

  subParser(name: string): Parser | undefined {
    return this.subParsers.get(name);
  }

  /**
   * Resolve an argument vector, program name first.
   */
  parse(args: readonly string[]): ParseResult {
    log.debug(`Parsing ${args.length} argument(s) with ${this.policy.kind} policy`, { parser: this.name });
    return this.policy.parse(args, {
      set: this.set,
      invoker: this.invoker,
      styles: this.styles,
      subParsers: this.subParsers.size > 0 ? { find: (name) => this.subParsers.get(name) } : undefined,
    });
  }

  /** First option registered under `name` (prefix included) or an alias. */
  option(name: string): Opt | undefined {
    return this.set.find(name);
  }

  /** Last stored value of the option named `name`. */
  value(name: string): OptValue | undefined {
    return this.set.find(name)?.value;
  }

  /** Every stored value of the option named `name`. */
  values(name: string): readonly OptValue[] {
    return this.set.find(name)?.getValues() ?? [];
  }
}
