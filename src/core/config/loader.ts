import * as path from 'node:path';
import { ManifestSchema, type Manifest, type ManifestInput, type OptionEntry, type Subcommand } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { Parser } from '../parser/parser.js';
import { parseDeclaration } from '../option/declaration.js';
import type { OptionSpec } from '../option/option-set.js';

const DEFAULT_MANIFEST_PATH = 'argmatch.yaml';

/**
 * Manifest with every default applied.
 * Used when no manifest file exists at the default location.
 */
export function getDefaultManifest(): Manifest {
  return ManifestSchema.parse({});
}

/**
 * Load a manifest. A missing file at the default location yields the default
 * manifest; a missing file at an explicit path is an error.
 */
export async function loadManifest(projectRoot: string, manifestPath?: string): Promise<Manifest> {
  const fullPath = getManifestPath(projectRoot, manifestPath);

  if (!(await fileExists(fullPath))) {
    if (manifestPath === undefined) {
      return getDefaultManifest();
    }
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Manifest not found: ${fullPath}`, { path: fullPath });
  }

  try {
    return await loadYamlWithSchema(fullPath, ManifestSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load manifest from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge a partial manifest with defaults.
 */
export function mergeManifest(partial: ManifestInput): Manifest {
  return ManifestSchema.parse(partial);
}

export function getManifestPath(projectRoot: string, manifestPath?: string): string {
  return path.resolve(projectRoot, manifestPath ?? DEFAULT_MANIFEST_PATH);
}

/**
 * Turn a manifest entry into an option spec.
 */
export function toOptionSpec(entry: OptionEntry): OptionSpec {
  if (typeof entry === 'string') {
    return parseDeclaration(entry);
  }
  const declared = parseDeclaration(entry.decl);
  return {
    ...declared,
    aliases: [...declared.aliases, ...entry.alias],
    ...(entry.kind !== undefined && { kind: entry.kind }),
    ...(entry.type !== undefined && { type: entry.type }),
    ...(entry.action !== undefined && { action: entry.action }),
    ...(entry.default !== undefined && { default: entry.default }),
    ...(entry.force !== undefined && { force: entry.force }),
    ...(entry.nodelay !== undefined && { nodelay: entry.nodelay }),
    ...(entry.styles !== undefined && { styles: entry.styles }),
    ...(entry.help !== undefined && { help: entry.help }),
  };
}

/**
 * Build a parser, with its sub-parsers, from a manifest.
 */
export function buildParser(manifest: Manifest | Subcommand): Parser {
  const parser = new Parser(manifest.name, {
    policy: manifest.policy,
    prefixes: manifest.prefixes,
    styles: manifest.styles,
    strict: manifest.strict,
    overload: manifest.overload,
    bareOptions: manifest.bare_options,
  });

  for (const entry of manifest.options) {
    parser.add(toOptionSpec(entry));
  }

  if ('subcommands' in manifest) {
    for (const sub of manifest.subcommands) {
      parser.addSubParser(buildParser(sub), sub.aliases);
    }
  }

  return parser;
}
