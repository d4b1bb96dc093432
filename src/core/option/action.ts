/**
 * Value-merge actions: how a newly invoked value combines with the values
 * already stored for the same option.
 */

/** A value produced by parsing or by a callback. */
export type OptValue = boolean | number | string;

export const ACTIONS = ['set', 'app', 'pop', 'cnt', 'clr', 'null'] as const;
export type Action = (typeof ACTIONS)[number];

/**
 * Merge `value` into `stored` according to `action`.
 * Returns a new array; `stored` is not modified.
 *
 * - `set`: replace everything with the value
 * - `app`: append the value
 * - `pop`: drop the last stored value
 * - `cnt`: increment a counter, ignoring the value
 * - `clr`: drop every stored value
 * - `null`: keep the store as it is
 */
export function applyAction(action: Action, stored: readonly OptValue[], value: OptValue): OptValue[] {
  switch (action) {
    case 'set':
      return [value];
    case 'app':
      return [...stored, value];
    case 'pop':
      return stored.slice(0, -1);
    case 'cnt': {
      const current = stored[0];
      return [typeof current === 'number' ? current + 1 : 1];
    }
    case 'clr':
      return [];
    case 'null':
      return [...stored];
  }
}
