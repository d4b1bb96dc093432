/**
 * Built-in value parsers, one per value type.
 */
import { MatchFailure, ErrorCodes } from '../../utils/errors.js';
import { isNoaStyle, type Style } from '../style/style.js';
import type { OptValue } from './action.js';

export const VALUE_TYPES = ['bool', 'int', 'uint', 'float', 'str', 'any'] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

/** What a parser knows about the match it is producing a value for. */
export interface ValueContext {
  uid: number;
  /** Display name of the option, prefix included. */
  name: string;
  style: Style;
  disabled: boolean;
}

/**
 * Turn a raw argument into a value, throwing MatchFailure to reject it.
 */
export type ValueParser = (raw: string | undefined, ctx: ValueContext) => OptValue;

const INT = /^[+-]?\d+$/;
const UINT = /^\+?\d+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function invalidValue(ctx: ValueContext, reason: string): MatchFailure {
  return new MatchFailure(
    ErrorCodes.INVALID_VALUE,
    `Invalid value for option '${ctx.name}': ${reason}`,
    { uid: ctx.uid, name: ctx.name }
  );
}

function requireRaw(raw: string | undefined, ctx: ValueContext): string {
  if (raw === undefined) {
    throw invalidValue(ctx, 'a value is required');
  }
  return raw;
}

const parseBool: ValueParser = (raw, ctx) => {
  if (ctx.disabled) return false;
  if (isNoaStyle(ctx.style)) return true;
  if (raw === undefined || raw === 'true') return true;
  if (raw === 'false') return false;
  throw invalidValue(ctx, `'${raw}' is not a boolean`);
};

const parseInteger: ValueParser = (raw, ctx) => {
  const text = requireRaw(raw, ctx);
  if (!INT.test(text)) {
    throw invalidValue(ctx, `'${text}' is not an integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw invalidValue(ctx, `'${text}' is out of range`);
  }
  return value;
};

const parseUint: ValueParser = (raw, ctx) => {
  const text = requireRaw(raw, ctx);
  if (!UINT.test(text)) {
    throw invalidValue(ctx, `'${text}' is not an unsigned integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw invalidValue(ctx, `'${text}' is out of range`);
  }
  return value;
};

const parseNumber: ValueParser = (raw, ctx) => {
  const text = requireRaw(raw, ctx);
  if (!FLOAT.test(text)) {
    throw invalidValue(ctx, `'${text}' is not a number`);
  }
  return Number(text);
};

const parseStr: ValueParser = (raw, ctx) => requireRaw(raw, ctx);

const parseAny: ValueParser = (raw) => raw ?? true;

const PARSERS: Record<ValueType, ValueParser> = {
  bool: parseBool,
  int: parseInteger,
  uint: parseUint,
  float: parseNumber,
  str: parseStr,
  any: parseAny,
};

/**
 * The built-in parser for a value type.
 */
export function parserFor(type: ValueType): ValueParser {
  return PARSERS[type];
}
