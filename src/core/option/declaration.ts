/**
 * Option declaration strings.
 *
 * Grammar: `[name][;alias...][=type][!|*][@index][:help]`
 *
 * @example
 * parseDeclaration('--count;-c=i!:how many')
 * // { name: '--count', aliases: ['-c'], kind: 'opt', type: 'int', force: true, help: 'how many' }
 *
 * parseDeclaration('second=s@2')
 * // { name: 'second', aliases: [], kind: 'pos', type: 'str', index: '2' }
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { OptKind } from './option.js';
import type { ValueType } from './value-parser.js';

/** User-facing option definition; names still carry their prefixes. */
export interface Declaration {
  name: string;
  aliases: string[];
  kind: OptKind;
  type?: ValueType;
  force?: boolean;
  index?: string;
  help?: string;
}

const DECLARATION = /^([^=!*@;:]+)?((?:;[^=!*@;:]+)+)?(?:=([a-zA-Z]+))?([!*])?(?:@([^@:]+))?(?::(.*))?$/;

const TYPE_LETTERS: Record<string, { kind: OptKind; type?: ValueType }> = {
  b: { kind: 'opt', type: 'bool' },
  bool: { kind: 'opt', type: 'bool' },
  i: { kind: 'opt', type: 'int' },
  int: { kind: 'opt', type: 'int' },
  u: { kind: 'opt', type: 'uint' },
  uint: { kind: 'opt', type: 'uint' },
  f: { kind: 'opt', type: 'float' },
  float: { kind: 'opt', type: 'float' },
  s: { kind: 'opt', type: 'str' },
  str: { kind: 'opt', type: 'str' },
  a: { kind: 'opt', type: 'any' },
  any: { kind: 'opt', type: 'any' },
  p: { kind: 'pos' },
  pos: { kind: 'pos' },
  c: { kind: 'cmd' },
  cmd: { kind: 'cmd' },
  m: { kind: 'main' },
  main: { kind: 'main' },
};

/**
 * Parse a declaration string. A value type combined with an index declares a
 * typed positional; an index without a type declares a boolean positional.
 */
export function parseDeclaration(text: string): Declaration {
  const match = DECLARATION.exec(text.trim());
  const fail = (reason: string) =>
    new ConfigError(ErrorCodes.INVALID_DECLARATION, `Invalid option declaration '${text}': ${reason}`, {
      declaration: text,
    });

  if (!match) {
    throw fail('does not follow name[;alias][=type][!|*][@index][:help]');
  }

  const [, rawName, rawAliases, letter, marker, index, help] = match;
  const name = rawName?.trim();
  if (!name) {
    throw fail('a name is required');
  }

  let kind: OptKind = index === undefined ? 'opt' : 'pos';
  let type: ValueType | undefined;
  if (letter !== undefined) {
    const resolved = TYPE_LETTERS[letter];
    if (!resolved) {
      throw fail(`unknown type '${letter}'`);
    }
    kind = resolved.kind === 'opt' && index !== undefined ? 'pos' : resolved.kind;
    type = resolved.type;
  }

  const aliases = (rawAliases ?? '')
    .split(';')
    .map((alias) => alias.trim())
    .filter((alias) => alias.length > 0);

  return {
    name,
    aliases,
    kind,
    type,
    force: marker === undefined ? undefined : marker === '!',
    index: index?.trim(),
    help: help?.trim() || undefined,
  };
}
