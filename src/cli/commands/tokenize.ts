import { Command } from 'commander';
import { DEFAULT_PREFIXES, splitArgument } from '../../core/token/tokenizer.js';
import { createFormatter } from '../formatters/index.js';

interface TokenizeOptions {
  prefix?: string[];
  json?: boolean;
  color: boolean;
}

/**
 * Create the tokenize command.
 */
export function createTokenizeCommand(): Command {
  return new Command('tokenize')
    .description('Show how each argument splits into prefix, name and value')
    .argument('<args...>', 'Arguments to split (put them after -- when they start with a prefix)')
    .option('-p, --prefix <prefixes...>', 'Option prefixes (default: -- -)')
    .option('--json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .action((args: string[], options: TokenizeOptions) => {
      const prefixes = options.prefix ?? DEFAULT_PREFIXES;
      const tokens = args.map((arg) => splitArgument(arg, prefixes));
      const formatter = createFormatter(options.json ? 'json' : 'human', { colors: options.color });
      console.log(formatter.formatTokens(tokens));
    });
}
