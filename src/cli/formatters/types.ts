/**
 * Formatter type definitions.
 */
import type { Opt } from '../../core/option/option.js';
import type { ParseResult } from '../../core/policy/types.js';
import type { Token } from '../../core/token/tokenizer.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Include recorded failures and raw arguments */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatResult(result: ParseResult): string;
  formatOptions(options: readonly Opt[]): string;
  formatTokens(tokens: readonly Token[]): string;
}
