import { Command } from 'commander';
import { buildParser, loadManifest } from '../../core/config/loader.js';
import type { Parser } from '../../core/parser/parser.js';
import { logger as log } from '../../utils/logger.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { createFormatter, describeOption } from '../formatters/index.js';

interface OptionsCommandOptions {
  manifest?: string;
  sub?: string;
  json?: boolean;
  yaml?: boolean;
  color: boolean;
}

/**
 * Create the options command.
 */
export function createOptionsCommand(): Command {
  return new Command('options')
    .description('List the options a manifest registers')
    .option('-m, --manifest <path>', 'Path to manifest file (default: argmatch.yaml)')
    .option('-s, --sub <name>', 'List a sub-parser instead, by name or alias')
    .option('--json', 'Output as JSON')
    .option('--yaml', 'Output as YAML')
    .option('--no-color', 'Disable colored output')
    .action(async (options: OptionsCommandOptions) => {
      try {
        await runOptions(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runOptions(options: OptionsCommandOptions): Promise<void> {
  const manifest = await loadManifest(process.cwd(), options.manifest);
  const root = buildParser(manifest);

  let parser: Parser = root;
  if (options.sub !== undefined) {
    const sub = root.subParser(options.sub);
    if (!sub) {
      throw new Error(`Unknown sub-parser: ${options.sub}`);
    }
    parser = sub;
  }

  const opts = [...parser.set];
  if (options.yaml) {
    console.log(stringifyYaml(opts.map(describeOption)).trimEnd());
    return;
  }

  const formatter = createFormatter(options.json ? 'json' : 'human', { colors: options.color });
  console.log(formatter.formatOptions(opts));
}
