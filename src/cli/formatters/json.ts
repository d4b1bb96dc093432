import { formatName, type Opt } from '../../core/option/option.js';
import { formatIndex } from '../../core/option/pos-index.js';
import type { ParseResult } from '../../core/policy/types.js';
import type { Token } from '../../core/token/tokenizer.js';
import type { IFormatter, FormatOptions } from './types.js';

/**
 * Plain-object view of a registered option, shared by the JSON and YAML listings.
 */
export function describeOption(opt: Opt): Record<string, unknown> {
  return {
    uid: opt.uid,
    name: opt.displayName,
    aliases: opt.aliases.map(formatName),
    kind: opt.kind,
    type: opt.valueType,
    styles: opt.styles,
    index: opt.kind === 'opt' ? null : formatIndex(opt.index),
    force: opt.force,
    action: opt.action,
    nodelay: opt.nodelay,
    help: opt.help ?? null,
  };
}

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private verbose: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.verbose = options.verbose ?? false;
  }

  formatResult(result: ParseResult): string {
    return JSON.stringify(this.transformResult(result), null, 2);
  }

  formatOptions(options: readonly Opt[]): string {
    return JSON.stringify(options.map(describeOption), null, 2);
  }

  formatTokens(tokens: readonly Token[]): string {
    return JSON.stringify(
      tokens.map((token) => ({
        raw: token.raw,
        prefix: token.prefix ?? null,
        name: token.name ?? null,
        value: token.value ?? null,
        disabled: token.disabled,
      })),
      null,
      2
    );
  }

  private transformResult(result: ParseResult): Record<string, unknown> {
    const output: Record<string, unknown> = {
      ok: result.ok,
      failure: result.failure ? result.failure.toJSON() : null,
      bindings: result.bindings.map((binding) => ({
        uid: binding.uid,
        name: binding.name,
        style: binding.style,
        value: binding.value,
        ...(binding.index !== undefined && { index: binding.index }),
        ...(this.verbose && binding.raw !== undefined && { raw: binding.raw }),
      })),
      noa: result.noa,
    };

    if (this.verbose) {
      output.failures = result.failures.map((failure) => ({ code: failure.code, message: failure.message }));
    }

    if (result.delegation) {
      output.delegation = {
        boundary_index: result.delegation.boundaryIndex,
        sub_parser: result.delegation.subParser,
        remaining_tokens: result.delegation.remainingTokens,
        result: this.transformResult(result.delegation.result),
      };
    }

    return output;
  }
}
