/**
 * Splits a raw argument into prefix, name, value and deactivation marker.
 */

/** Marker placed right after the prefix to request deactivation (`--/flag`). */
export const DEACTIVATE_MARKER = '/';

export const DEFAULT_PREFIXES: readonly string[] = ['--', '-'];

/**
 * One raw argument, classified.
 * `prefix` is absent when no configured prefix matched.
 */
export interface Token {
  raw: string;
  prefix?: string;
  name?: string;
  value?: string;
  disabled: boolean;
}

/** A token that can be matched against options. */
export type OptionToken = Token & { prefix: string; name: string };

/**
 * Deduplicate prefixes and order them longest first.
 */
export function sortPrefixes(prefixes: Iterable<string>): string[] {
  return [...new Set(prefixes)].sort((a, b) => b.length - a.length);
}

/**
 * Split `raw` using the longest matching prefix.
 *
 * @example
 * splitArgument('--/name=v', ['-', '--'])
 * // { raw: '--/name=v', prefix: '--', name: 'name', value: 'v', disabled: true }
 */
export function splitArgument(raw: string, prefixes: Iterable<string>): Token {
  const prefix = sortPrefixes(prefixes).find((p) => raw.startsWith(p));

  if (prefix === undefined) {
    return { raw, disabled: false };
  }

  let rest = raw.slice(prefix.length);
  const disabled = rest.startsWith(DEACTIVATE_MARKER);
  if (disabled) {
    rest = rest.slice(DEACTIVATE_MARKER.length);
  }

  const eq = rest.indexOf('=');
  const name = eq >= 0 ? rest.slice(0, eq) : rest;
  const value = eq >= 0 ? rest.slice(eq + 1) : undefined;

  return {
    raw,
    prefix,
    name: name.length > 0 ? name : undefined,
    value,
    disabled,
  };
}

/**
 * Whether a token carries both a prefix and a name.
 */
export function isOptionToken(token: Token): token is OptionToken {
  return token.prefix !== undefined && token.name !== undefined;
}
