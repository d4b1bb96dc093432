import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createParseCommand } from './commands/parse.js';
import { createTokenizeCommand } from './commands/tokenize.js';
import { createOptionsCommand } from './commands/options.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageSchema = z.object({ version: z.string() });
const VERSION = PackageSchema.parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('argmatch')
    .description('Inspect how command-line arguments resolve against declared options')
    .version(VERSION);
  [createParseCommand, createTokenizeCommand, createOptionsCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
