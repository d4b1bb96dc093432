/**
 * Option registry: an arena of options indexed by uid.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { Style } from '../style/style.js';
import { DEFAULT_PREFIXES, isOptionToken, sortPrefixes, splitArgument } from '../token/tokenizer.js';
import type { Action, OptValue } from './action.js';
import { parseDeclaration } from './declaration.js';
import { Opt, type OptInit, type OptKind, type OptName } from './option.js';
import { anywhere, forward, parseIndex, type PosIndex } from './pos-index.js';
import { parserFor, type ValueParser, type ValueType } from './value-parser.js';

/** User-facing option definition; names carry their prefixes. */
export interface OptionSpec {
  name: string;
  aliases?: string[];
  kind?: OptKind;
  type?: ValueType;
  styles?: Style[];
  index?: string | PosIndex;
  force?: boolean;
  action?: Action;
  nodelay?: boolean;
  help?: string;
  default?: OptValue | OptValue[];
  parser?: ValueParser;
}

const DEFAULT_STYLES: Record<OptKind, (type: ValueType) => Style[]> = {
  opt: (type) => (type === 'bool' ? ['boolean', 'combined', 'flag'] : ['argument']),
  pos: () => ['pos'],
  cmd: () => ['cmd'],
  main: () => ['main'],
};

const DEFAULT_TYPES: Record<OptKind, ValueType> = {
  opt: 'str',
  pos: 'bool',
  cmd: 'bool',
  main: 'any',
};

/**
 * Registry of options in registration order. An option's uid is its slot.
 */
export class OptionSet implements Iterable<Opt> {
  private readonly opts: Opt[] = [];
  private readonly prefixList: string[];

  constructor(prefixes: Iterable<string> = DEFAULT_PREFIXES) {
    this.prefixList = sortPrefixes(prefixes);
  }

  /** Recognised prefixes, longest first. */
  get prefixes(): readonly string[] {
    return this.prefixList;
  }

  get size(): number {
    return this.opts.length;
  }

  /**
   * Register an option from a declaration string or a spec.
   * Returns the new option's uid.
   */
  add(spec: OptionSpec | string, overrides: Partial<OptionSpec> = {}): number {
    const base = typeof spec === 'string' ? parseDeclaration(spec) : spec;
    const uid = this.opts.length;
    this.opts.push(new Opt(uid, this.resolve({ ...base, ...overrides })));
    return uid;
  }

  /**
   * Option by uid.
   */
  get(uid: number): Opt {
    const opt = this.opts[uid];
    if (!opt) {
      throw new ConfigError(ErrorCodes.UNKNOWN_OPTION, `No option registered with uid ${uid}`, { uid });
    }
    return opt;
  }

  /**
   * First option whose name or alias equals `name` (prefix included).
   */
  find(name: string): Opt | undefined {
    return this.findAll(name)[0];
  }

  /**
   * Every option whose name or alias equals `name`, in registration order.
   */
  findAll(name: string): Opt[] {
    const wanted = this.splitName(name);
    return this.opts.filter((opt) => {
      if (opt.kind !== 'opt') {
        return opt.matchName(undefined, name) || opt.matchAlias(undefined, name);
      }
      return wanted !== undefined && (opt.matchName(wanted.prefix, wanted.name) || opt.matchAlias(wanted.prefix, wanted.name));
    });
  }

  /**
   * Options of the given kinds, in registration order.
   */
  options(...kinds: OptKind[]): Opt[] {
    return kinds.length === 0 ? [...this.opts] : this.opts.filter((opt) => kinds.includes(opt.kind));
  }

  has(kind: OptKind): boolean {
    return this.opts.some((opt) => opt.kind === kind);
  }

  /** Reset every option to its defaults. */
  reset(): void {
    for (const opt of this.opts) {
      opt.reset();
    }
  }

  [Symbol.iterator](): Iterator<Opt> {
    return this.opts[Symbol.iterator]();
  }

  /**
   * Split an option name on the registered prefixes. Names without a
   * registered prefix are bare names (empty prefix).
   */
  private splitName(text: string): (OptName & { disabled: boolean }) | undefined {
    const token = splitArgument(text, this.prefixList);
    if (token.value !== undefined) {
      return undefined;
    }
    if (isOptionToken(token)) {
      return { prefix: token.prefix, name: token.name, disabled: token.disabled };
    }
    return text.length > 0 ? { prefix: '', name: text, disabled: false } : undefined;
  }

  private resolve(spec: OptionSpec): OptInit {
    const kind = spec.kind ?? 'opt';
    const valueType = spec.type ?? DEFAULT_TYPES[kind];
    const invalid = (reason: string) =>
      new ConfigError(ErrorCodes.INVALID_DECLARATION, `Invalid option '${spec.name}': ${reason}`, {
        name: spec.name,
      });

    let name: OptName;
    let deactivatable = false;
    if (kind === 'opt') {
      const split = this.splitName(spec.name);
      if (!split) {
        throw invalid('option names must be non-empty and must not contain "="');
      }
      name = { prefix: split.prefix, name: split.name };
      deactivatable = split.disabled;
    } else {
      if (spec.name.length === 0) {
        throw invalid('a name is required');
      }
      name = { name: spec.name };
    }

    const aliases = (spec.aliases ?? []).map((alias) => {
      if (kind !== 'opt') {
        return { name: alias };
      }
      const split = this.splitName(alias);
      if (!split || split.disabled) {
        throw invalid(`alias '${alias}' is not a valid option name`);
      }
      return { prefix: split.prefix, name: split.name };
    });

    const index = resolveIndexSpec(kind, spec.index);
    if (kind === 'pos' && index.kind === 'null') {
      throw invalid('positional options need an index');
    }

    const defaults =
      spec.default === undefined
        ? valueType === 'bool' && kind === 'opt'
          ? [deactivatable]
          : []
        : Array.isArray(spec.default)
          ? [...spec.default]
          : [spec.default];

    return {
      ...name,
      aliases,
      kind,
      valueType,
      styles: spec.styles ?? DEFAULT_STYLES[kind](valueType),
      index,
      force: spec.force ?? kind === 'cmd',
      deactivatable,
      action: spec.action ?? (kind === 'main' ? 'null' : 'set'),
      nodelay: spec.nodelay ?? false,
      help: spec.help,
      defaults,
      parser: spec.parser ?? parserFor(valueType),
    };
  }
}

function resolveIndexSpec(kind: OptKind, index: string | PosIndex | undefined): PosIndex {
  if (kind === 'cmd') return forward(1);
  if (kind === 'main') return anywhere();
  if (index === undefined) return { kind: 'null' };
  return typeof index === 'string' ? parseIndex(index) : index;
}
