import chalk from 'chalk';
import { formatName, type Opt } from '../../core/option/option.js';
import { formatIndex } from '../../core/option/pos-index.js';
import type { Binding, ParseResult } from '../../core/policy/types.js';
import type { Token } from '../../core/token/tokenizer.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatResult(result: ParseResult): string {
    return this.resultLines(result, '').join('\n');
  }

  formatOptions(options: readonly Opt[]): string {
    if (options.length === 0) {
      return this.colorize('No options registered', 'dim');
    }

    const lines: string[] = [];
    for (const opt of options) {
      const names = [opt.displayName, ...opt.aliases.map(formatName)].join(', ');
      const flags = [
        opt.valueType,
        opt.action,
        ...(opt.kind !== 'opt' ? [`@${formatIndex(opt.index)}`] : []),
        ...(opt.force ? ['required'] : []),
        ...(opt.nodelay ? ['nodelay'] : []),
      ].join(' ');
      lines.push(`${String(opt.uid).padStart(3)}  ${opt.kind.padEnd(4)} ${names} ${this.colorize(`(${flags})`, 'dim')}`);
      if (opt.help) {
        lines.push(`       ${opt.help}`);
      }
    }
    return lines.join('\n');
  }

  formatTokens(tokens: readonly Token[]): string {
    return tokens
      .map((token) => {
        if (token.prefix === undefined) {
          return `${token.raw} ${this.colorize('(argument)', 'dim')}`;
        }
        const parts = [`prefix=${token.prefix}`, `name=${token.name ?? ''}`];
        if (token.value !== undefined) parts.push(`value=${token.value}`);
        if (token.disabled) parts.push('disabled');
        return `${token.raw} ${this.colorize(`(${parts.join(' ')})`, 'cyan')}`;
      })
      .join('\n');
  }

  private resultLines(result: ParseResult, indent: string): string[] {
    const lines: string[] = [];

    if (result.ok) {
      lines.push(`${indent}${this.colorize('✓', 'green')} ${this.colorize('OK', 'green')}`);
    } else {
      lines.push(`${indent}${this.colorize('✗', 'red')} ${this.colorize('FAILED', 'red')}`);
      for (const [depth, error] of (result.failure?.chain() ?? []).entries()) {
        const label = depth === 0 ? '' : 'caused by ';
        lines.push(`${indent}   ${this.colorize(`${label}[${error.code}]`, 'red')} ${error.message}`);
      }
    }

    if (result.bindings.length > 0) {
      lines.push(`${indent}   Bindings:`);
      for (const binding of result.bindings) {
        lines.push(`${indent}      ${this.formatBinding(binding)}`);
      }
    }

    lines.push(`${indent}   NOA: ${result.noa.join(' ')}`);

    if (this.options.verbose && result.failures.length > 0) {
      lines.push(`${indent}   ${this.colorize(`Recorded failures (${result.failures.length}):`, 'yellow')}`);
      for (const failure of result.failures) {
        lines.push(`${indent}      [${failure.code}] ${failure.message}`);
      }
    }

    if (result.delegation) {
      const { subParser, boundaryIndex } = result.delegation;
      lines.push(`${indent}   ${this.colorize(`→ ${subParser} (from argument ${boundaryIndex})`, 'cyan')}`);
      lines.push(...this.resultLines(result.delegation.result, `${indent}   `));
    }

    return lines;
  }

  private formatBinding(binding: Binding): string {
    const at = binding.index !== undefined ? `@${binding.index}` : '';
    const raw = this.options.verbose && binding.raw !== undefined ? ` ${this.colorize(`<- ${binding.raw}`, 'dim')}` : '';
    return `${binding.name}${at} = ${String(binding.value)} ${this.colorize(`[${binding.style}]`, 'dim')}${raw}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
