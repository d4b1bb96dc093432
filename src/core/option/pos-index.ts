/**
 * Position constraints for non-option arguments (NOAs).
 *
 * NOA positions count the program name as 0, so the first argument after
 * it is 1. `total` is the number of NOAs including the program name.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export type PosIndex =
  | { kind: 'forward'; offset: number }
  | { kind: 'backward'; offset: number }
  | { kind: 'list'; list: number[] }
  | { kind: 'except'; list: number[] }
  | { kind: 'range'; start: number; end?: number }
  | { kind: 'anywhere' }
  | { kind: 'null' };

export const forward = (offset: number): PosIndex => ({ kind: 'forward', offset });
export const backward = (offset: number): PosIndex => ({ kind: 'backward', offset });
export const anywhere = (): PosIndex => ({ kind: 'anywhere' });

const NUMBER = /^\d+$/;
const LIST = /^([+-]?)\[(.*)\]$/;
const RANGE = /^(\d*)\.\.(\d*)$/;
const SIGNED = /^([+-]?)(\d+)$/;

function invalid(expr: string, reason: string): ConfigError {
  return new ConfigError(ErrorCodes.INVALID_INDEX, `Invalid index '${expr}': ${reason}`, {
    index: expr,
  });
}

function parseList(expr: string, body: string): number[] {
  const items = body.split(',').map((item) => item.trim());
  if (items.length === 0 || items.some((item) => !NUMBER.test(item))) {
    throw invalid(expr, 'list items must be non-negative integers');
  }
  return items.map(Number);
}

/**
 * Parse an index expression.
 *
 * | expression | meaning |
 * |---|---|
 * | `3`, `+3` | position 3 |
 * | `-1` | last position |
 * | `[1,3]`, `+[1,3]` | positions 1 and 3 |
 * | `-[1,3]` | every position except 1 and 3 |
 * | `1..4`, `..4`, `2..` | range, end exclusive |
 * | `*` | anywhere |
 */
export function parseIndex(expr: string): PosIndex {
  const text = expr.trim();

  if (text === '*') {
    return anywhere();
  }

  const list = LIST.exec(text);
  if (list) {
    const [, sign, body] = list;
    const items = parseList(expr, body ?? '');
    return sign === '-' ? { kind: 'except', list: items } : { kind: 'list', list: items };
  }

  const range = RANGE.exec(text);
  if (range) {
    const [, start, end] = range;
    const from = start ? Number(start) : 0;
    if (!end) {
      return { kind: 'range', start: from };
    }
    const to = Number(end);
    if (to <= from) {
      throw invalid(expr, 'range end must be greater than its start');
    }
    return { kind: 'range', start: from, end: to };
  }

  const signed = SIGNED.exec(text);
  if (signed) {
    const [, sign, digits] = signed;
    const offset = Number(digits);
    if (sign === '-') {
      if (offset === 0) {
        throw invalid(expr, 'backward offsets start at 1');
      }
      return backward(offset);
    }
    return forward(offset);
  }

  throw invalid(expr, 'unrecognised syntax');
}

/**
 * Resolve the position an index refers to, given the current position.
 * Returns undefined when the index cannot refer to any position.
 */
export function resolveIndex(index: PosIndex, current: number, total: number): number | undefined {
  switch (index.kind) {
    case 'forward':
      return index.offset < total ? index.offset : undefined;
    case 'backward':
      return index.offset <= total ? total - index.offset : undefined;
    case 'list':
      return current < total && index.list.includes(current) ? current : undefined;
    case 'except':
      return current < total && !index.list.includes(current) ? current : undefined;
    case 'range': {
      const inRange = current >= index.start && (index.end === undefined || current < index.end);
      return inRange && current < total ? current : undefined;
    }
    case 'anywhere':
      return current < total ? current : undefined;
    case 'null':
      return undefined;
  }
}

/**
 * Whether `index` accepts the NOA at `current`.
 */
export function matchesIndex(index: PosIndex, current: number, total: number): boolean {
  return resolveIndex(index, current, total) === current;
}

/**
 * Render an index in its canonical expression form.
 */
export function formatIndex(index: PosIndex): string {
  switch (index.kind) {
    case 'forward':
      return `${index.offset}`;
    case 'backward':
      return `-${index.offset}`;
    case 'list':
      return `[${index.list.join(', ')}]`;
    case 'except':
      return `-[${index.list.join(', ')}]`;
    case 'range':
      return `${index.start === 0 ? '' : index.start}..${index.end ?? ''}`;
    case 'anywhere':
      return '*';
    case 'null':
      return '';
  }
}
