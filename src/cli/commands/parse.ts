/**
 * Run a manifest-defined parser over an argument vector.
 */
import { Command, Option } from 'commander';
import { buildParser, loadManifest } from '../../core/config/loader.js';
import { POLICY_KINDS, type PolicyKind } from '../../core/policy/types.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface ParseOptions {
  manifest?: string;
  policy?: PolicyKind;
  json?: boolean;
  verbose?: boolean;
  color: boolean;
}

/**
 * Create the parse command.
 */
export function createParseCommand(): Command {
  return new Command('parse')
    .description('Resolve arguments against the options declared in a manifest')
    .argument('[args...]', 'Arguments to resolve, after --; the program name is taken from the manifest')
    .option('-m, --manifest <path>', 'Path to manifest file (default: argmatch.yaml)')
    .addOption(new Option('--policy <kind>', 'Override the manifest policy').choices(POLICY_KINDS))
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show recorded failures, raw arguments and debug logs')
    .option('--no-color', 'Disable colored output')
    .action(async (args: string[], options: ParseOptions) => {
      let ok: boolean;
      try {
        ok = await runParse(args, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
      if (!ok) {
        process.exit(1);
      }
    });
}

async function runParse(args: string[], options: ParseOptions): Promise<boolean> {
  if (options.verbose) {
    log.setLevel('debug');
  }

  const manifest = await loadManifest(process.cwd(), options.manifest);
  const parser = buildParser(options.policy ? { ...manifest, policy: options.policy } : manifest);
  const result = parser.parse([parser.name, ...args]);

  const formatter = createFormatter(options.json ? 'json' : 'human', {
    colors: options.color,
    verbose: options.verbose ?? false,
  });
  console.log(formatter.formatResult(result));

  return result.ok;
}
