/**
 * A registered option: identity, matching predicates and stored values.
 */
import type { Style } from '../style/style.js';
import { applyAction, type Action, type OptValue } from './action.js';
import { matchesIndex, type PosIndex } from './pos-index.js';
import type { ValueParser, ValueType } from './value-parser.js';

export const OPT_KINDS = ['opt', 'pos', 'cmd', 'main'] as const;
export type OptKind = (typeof OPT_KINDS)[number];

/** A `(prefix, name)` pair; positional kinds carry no prefix. */
export interface OptName {
  prefix?: string;
  name: string;
}

/** Fully resolved option definition. */
export interface OptInit {
  name: string;
  prefix?: string;
  aliases: OptName[];
  kind: OptKind;
  valueType: ValueType;
  styles: Style[];
  index: PosIndex;
  force: boolean;
  deactivatable: boolean;
  action: Action;
  nodelay: boolean;
  help?: string;
  defaults: OptValue[];
  parser: ValueParser;
}

/** Mutable match state, captured before a match so it can be undone. */
export interface OptSnapshot {
  values: OptValue[];
  rawValues: string[];
  hits: number;
  pending: number;
}

export function formatName(name: OptName): string {
  return `${name.prefix ?? ''}${name.name}`;
}

export class Opt {
  readonly name: string;
  readonly prefix?: string;
  readonly aliases: readonly OptName[];
  readonly kind: OptKind;
  readonly valueType: ValueType;
  readonly styles: readonly Style[];
  readonly index: PosIndex;
  readonly force: boolean;
  readonly deactivatable: boolean;
  readonly action: Action;
  readonly nodelay: boolean;
  readonly help?: string;
  readonly defaults: readonly OptValue[];
  private readonly parser: ValueParser;

  private values: OptValue[];
  private rawValues: string[] = [];
  /** Invocations that stored a value. */
  private hits = 0;
  /** Confirmed matches still waiting for their invocation. */
  private pending = 0;

  constructor(
    readonly uid: number,
    init: OptInit
  ) {
    this.name = init.name;
    this.prefix = init.prefix;
    this.aliases = init.aliases;
    this.kind = init.kind;
    this.valueType = init.valueType;
    this.styles = init.styles;
    this.index = init.index;
    this.force = init.force;
    this.deactivatable = init.deactivatable;
    this.action = init.action;
    this.nodelay = init.nodelay;
    this.help = init.help;
    this.defaults = init.defaults;
    this.parser = init.parser;
    this.values = [...init.defaults];
  }

  /** Name with its prefix, e.g. `--foo`. */
  get displayName(): string {
    return formatName(this);
  }

  get matched(): boolean {
    return this.hits > 0 || this.pending > 0;
  }

  /** True while a confirmed match waits for its callback. */
  get needsInvoke(): boolean {
    return this.pending > 0;
  }

  /** The most recently stored value. */
  get value(): OptValue | undefined {
    return this.values[this.values.length - 1];
  }

  getValues(): readonly OptValue[] {
    return this.values;
  }

  getRawValues(): readonly string[] {
    return this.rawValues;
  }

  supportsStyle(style: Style): boolean {
    return this.styles.includes(style);
  }

  matchName(prefix: string | undefined, name: string): boolean {
    return this.prefix === prefix && this.name === name;
  }

  matchAlias(prefix: string | undefined, name: string): boolean {
    return this.aliases.some((alias) => alias.prefix === prefix && alias.name === name);
  }

  matchIndex(current: number, total: number): boolean {
    return matchesIndex(this.index, current, total);
  }

  /** A force-required option is valid once it has matched. */
  isValid(): boolean {
    return !this.force || this.matched;
  }

  /**
   * Run the option's value parser. Throws MatchFailure on rejection.
   */
  parse(raw: string | undefined, style: Style, disabled: boolean): OptValue {
    return this.parser(raw, { uid: this.uid, name: this.displayName, style, disabled });
  }

  markPending(): void {
    this.pending += 1;
  }

  /** Drop one pending marker without storing anything. */
  clearPending(): void {
    this.pending = Math.max(0, this.pending - 1);
  }

  /**
   * Store an invoked value through the option's action.
   */
  store(value: OptValue, raw?: string): void {
    this.values = applyAction(this.action, this.values, value);
    if (raw !== undefined) {
      this.rawValues.push(raw);
    }
    this.hits += 1;
    this.clearPending();
  }

  snapshot(): OptSnapshot {
    return {
      values: [...this.values],
      rawValues: [...this.rawValues],
      hits: this.hits,
      pending: this.pending,
    };
  }

  restore(snapshot: OptSnapshot): void {
    this.values = [...snapshot.values];
    this.rawValues = [...snapshot.rawValues];
    this.hits = snapshot.hits;
    this.pending = snapshot.pending;
  }

  /** Back to the registered defaults, ready for a new parse. */
  reset(): void {
    this.values = [...this.defaults];
    this.rawValues = [];
    this.hits = 0;
    this.pending = 0;
  }
}
