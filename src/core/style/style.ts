/**
 * Match styles and the ordered catalog of enabled user styles.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/** How a successful match acquired its value. */
export const STYLES = ['pos', 'cmd', 'main', 'boolean', 'argument', 'combined', 'flag'] as const;
export type Style = (typeof STYLES)[number];

/** Positional styles, resolved against the NOA list. */
export const NOA_STYLES: readonly Style[] = ['pos', 'cmd', 'main'];

/** Syntax dialects the option scan may try, in catalog order. */
export const USER_STYLES = [
  'equal-with-value',
  'argument',
  'boolean',
  'flag',
  'embedded-value',
  'embedded-value-plus',
  'combined-option',
] as const;
export type UserStyle = (typeof USER_STYLES)[number];

export const DEFAULT_USER_STYLES: readonly UserStyle[] = [
  'equal-with-value',
  'argument',
  'boolean',
  'embedded-value',
];

export function isUserStyle(value: string): value is UserStyle {
  return USER_STYLES.some((style) => style === value);
}

export function isNoaStyle(style: Style): boolean {
  return NOA_STYLES.includes(style);
}

/**
 * Ordered, duplicate-free list of enabled user styles.
 */
export class StyleCatalog implements Iterable<UserStyle> {
  private styles: UserStyle[];

  constructor(styles: Iterable<UserStyle> = DEFAULT_USER_STYLES) {
    this.styles = [...new Set(styles)];
  }

  /**
   * Parse style names, rejecting unknown ones.
   */
  static from(names: Iterable<string>): StyleCatalog {
    const styles: UserStyle[] = [];
    for (const name of names) {
      if (!isUserStyle(name)) {
        throw new ConfigError(
          ErrorCodes.INVALID_STYLE,
          `Unknown style '${name}'. Expected one of: ${USER_STYLES.join(', ')}`,
          { style: name }
        );
      }
      styles.push(name);
    }
    return new StyleCatalog(styles);
  }

  list(): readonly UserStyle[] {
    return this.styles;
  }

  has(style: UserStyle): boolean {
    return this.styles.includes(style);
  }

  /**
   * Append a style unless it is already enabled.
   */
  push(style: UserStyle): this {
    if (!this.has(style)) {
      this.styles.push(style);
    }
    return this;
  }

  /**
   * Insert a style at `index`, moving it if it is already enabled.
   */
  insert(index: number, style: UserStyle): this {
    this.remove(style);
    const at = Math.max(0, Math.min(index, this.styles.length));
    this.styles.splice(at, 0, style);
    return this;
  }

  remove(style: UserStyle): boolean {
    const at = this.styles.indexOf(style);
    if (at < 0) return false;
    this.styles.splice(at, 1);
    return true;
  }

  set(styles: Iterable<UserStyle>): this {
    this.styles = [...new Set(styles)];
    return this;
  }

  clone(): StyleCatalog {
    return new StyleCatalog(this.styles);
  }

  [Symbol.iterator](): Iterator<UserStyle> {
    return this.styles[Symbol.iterator]();
  }
}
