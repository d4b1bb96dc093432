/**
 * Policy contracts shared by the Forward, Delay and Pre orchestrators.
 */
import type { ArgMatchError, MatchFailure } from '../../utils/errors.js';
import type { Invoker } from '../invoke/invoker.js';
import type { OptValue } from '../option/action.js';
import type { OptionSet } from '../option/option-set.js';
import type { Style, StyleCatalog } from '../style/style.js';

export const POLICY_KINDS = ['forward', 'delay', 'pre'] as const;
export type PolicyKind = (typeof POLICY_KINDS)[number];

export interface PolicySettings {
  /** Unknown prefixed tokens fail the parse instead of becoming NOAs. */
  strict: boolean;
  /** Keep trying same-named options after one rejects a token. */
  overload: boolean;
  /** Match prefix-less tokens against bare option names. */
  bareOptions: boolean;
}

/** One confirmed binding, in confirmation order. */
export interface Binding {
  uid: number;
  name: string;
  style: Style;
  /** NOA position for positional bindings. */
  index?: number;
  value: OptValue;
  raw?: string;
}

/** Where a Pre policy handed the rest of the arguments to a sub-parser. */
export interface Delegation {
  boundaryIndex: number;
  subParser: string;
  remainingTokens: string[];
  result: ParseResult;
}

export interface ParseResult {
  ok: boolean;
  /** Terminal failure with its cause chain. */
  failure?: ArgMatchError;
  bindings: Binding[];
  /** Non-option arguments, program name first. */
  noa: string[];
  /** Every recoverable failure recorded during the parse. */
  failures: MatchFailure[];
  delegation?: Delegation;
}

export interface SubParserEntry {
  readonly name: string;
  parse(args: readonly string[]): ParseResult;
}

export interface SubParserLookup {
  /** Sub-parser registered under `name` or one of its aliases. */
  find(name: string): SubParserEntry | undefined;
}

/** Collaborators a policy resolves against. */
export interface ParseEnv {
  set: OptionSet;
  invoker: Invoker;
  styles: StyleCatalog;
  subParsers?: SubParserLookup;
}

export interface Policy {
  readonly kind: PolicyKind;
  readonly settings: Readonly<PolicySettings>;
  parse(args: readonly string[], env: ParseEnv): ParseResult;
}
