/**
 * Builds the Process a user style proposes for one option token.
 */
import { Match, type MatchTarget } from '../match/match.js';
import { Process } from '../match/process.js';
import type { OptionToken } from '../token/tokenizer.js';
import type { UserStyle } from './style.js';

export interface GuessInput {
  token: OptionToken;
  /** The raw argument after the token, if any. */
  next?: string;
  /** Position of the token in the argument list. */
  index: number;
  total: number;
  overload: boolean;
}

type Shape = Omit<MatchTarget, 'disabled' | 'index' | 'total' | 'raw'>;

/**
 * The Process `style` proposes for the token, or undefined when the token
 * does not have the shape the style needs.
 */
export function guessProcess(style: UserStyle, input: GuessInput): Process | undefined {
  const { token, next } = input;
  const { prefix, name, value } = token;
  const chars = [...name];

  const build = (mode: 'single' | 'any' | 'all', shapes: Shape[]): Process | undefined => {
    const first = shapes[0];
    if (!first) return undefined;
    const process = new Process(first.style, mode);
    for (const shape of shapes) {
      process.add(
        new Match(
          { ...shape, disabled: token.disabled, index: input.index, total: input.total, raw: token.raw },
          input.overload
        )
      );
    }
    return process;
  };

  switch (style) {
    case 'equal-with-value':
      if (value === undefined) return undefined;
      return build('single', [{ style: 'argument', prefix, name, arg: value, consume: false }]);

    // `arg` is undefined after the last argument; the option records the missing argument
    case 'argument':
      if (value !== undefined) return undefined;
      return build('single', [{ style: 'argument', prefix, name, arg: next, consume: true }]);

    case 'boolean':
      if (value !== undefined) return undefined;
      return build('single', [{ style: 'boolean', prefix, name, arg: 'true', consume: false }]);

    case 'flag':
      if (value !== undefined) return undefined;
      return build('single', [{ style: 'flag', prefix, name, consume: false }]);

    case 'embedded-value': {
      if (value !== undefined || chars.length < 2) return undefined;
      const [head, ...rest] = chars;
      return build('single', [{ style: 'argument', prefix, name: head, arg: rest.join(''), consume: false }]);
    }

    case 'embedded-value-plus': {
      if (value !== undefined || chars.length < 2) return undefined;
      const shapes: Shape[] = [];
      for (let at = 1; at < chars.length; at++) {
        shapes.push({
          style: 'argument',
          prefix,
          name: chars.slice(0, at).join(''),
          arg: chars.slice(at).join(''),
          consume: false,
        });
      }
      return build('any', shapes);
    }

    case 'combined-option':
      if (value !== undefined || chars.length < 2) return undefined;
      return build(
        'all',
        chars.map((char): Shape => ({ style: 'combined', prefix, name: char, arg: 'true', consume: false }))
      );
  }
}
