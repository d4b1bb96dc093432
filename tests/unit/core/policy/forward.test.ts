/**
 * Tests for the forward policy.
 */
import { describe, it, expect } from 'vitest';
import { Invoker } from '../../../../src/core/invoke/invoker.js';
import { OptionSet } from '../../../../src/core/option/option-set.js';
import { ForwardPolicy } from '../../../../src/core/policy/forward.js';
import type { ParseEnv } from '../../../../src/core/policy/types.js';
import { StyleCatalog, type UserStyle } from '../../../../src/core/style/style.js';
import { ErrorCodes, MatchFailure } from '../../../../src/utils/errors.js';

function envOf(decls: string[], styles?: UserStyle[]): ParseEnv {
  const set = new OptionSet();
  for (const decl of decls) set.add(decl);
  return { set, invoker: new Invoker(), styles: new StyleCatalog(styles) };
}

describe('ForwardPolicy', () => {
  it('should default to strict mode without overloading', () => {
    expect(new ForwardPolicy().settings).toEqual({ strict: true, overload: false, bareOptions: false });
  });

  it('should bind options in argument order and keep the rest as NOAs', () => {
    const env = envOf(['--count;-c=i', '--name=s', '-v=b']);

    const result = new ForwardPolicy().parse(['app', '--count', '3', '-v', '--name=x', 'file'], env);

    expect(result.ok).toBe(true);
    expect(result.bindings).toEqual([
      { uid: 0, name: '--count', style: 'argument', value: 3, raw: '3' },
      { uid: 2, name: '-v', style: 'boolean', value: true, raw: 'true' },
      { uid: 1, name: '--name', style: 'argument', value: 'x', raw: 'x' },
    ]);
    expect(result.noa).toEqual(['app', 'file']);
    expect(result.failures).toEqual([]);
  });

  it('should match aliases and embedded values', () => {
    const env = envOf(['--count;-c=i']);

    const result = new ForwardPolicy().parse(['app', '-c42'], env);

    expect(result.bindings.map((b) => [b.name, b.value])).toEqual([['--count', 42]]);
    expect(env.set.get(0).getRawValues()).toEqual(['42']);
  });

  describe('strict mode', () => {
    it('should fail on an unknown option', () => {
      const result = new ForwardPolicy().parse(['app', '--nope'], envOf(['--name=s']));

      expect(result.ok).toBe(false);
      expect(result.failure?.code).toBe(ErrorCodes.OPTION_NOT_FOUND);
      expect(result.failure?.message).toBe("Can not find option '--nope'");
      expect(result.failure?.cause).toBeUndefined();
      expect(result.noa).toEqual(['app']);
    });

    it('should chain the failure to the value error behind it', () => {
      const result = new ForwardPolicy().parse(['app', '--count=abc'], envOf(['--count=i!']));

      expect(result.failure?.chain().map((e) => e.code)).toEqual([
        ErrorCodes.OPTION_NOT_FOUND,
        ErrorCodes.INVALID_VALUE,
      ]);
    });

    it('should keep unknown options as NOAs when not strict', () => {
      const result = new ForwardPolicy({ strict: false }).parse(['app', '--nope', 'x'], envOf(['--name=s']));

      expect(result.ok).toBe(true);
      expect(result.noa).toEqual(['app', '--nope', 'x']);
    });
  });

  describe('missing arguments', () => {
    it('should chain the unknown option to the missing argument in strict mode', () => {
      const result = new ForwardPolicy().parse(['app', '--out'], envOf(['--out=s']));

      expect(result.ok).toBe(false);
      expect(result.failure?.message).toBe("Can not find option '--out'");
      expect(result.failure?.chain().map((e) => e.code)).toEqual([
        ErrorCodes.OPTION_NOT_FOUND,
        ErrorCodes.MISSING_ARGUMENT,
      ]);
      expect(result.failures.map((f) => f.message)).toEqual(["Missing argument for option '--out'"]);
      expect(result.failures[0]?.uid).toBe(0);
    });

    it('should record the missing argument and keep the token when not strict', () => {
      const result = new ForwardPolicy({ strict: false }).parse(['app', '--out'], envOf(['--out=s']));

      expect(result.ok).toBe(true);
      expect(result.noa).toEqual(['app', '--out']);
      expect(result.failures.map((f) => f.code)).toEqual([ErrorCodes.MISSING_ARGUMENT]);
    });

    it('should explain a missing required option with its missing argument', () => {
      const result = new ForwardPolicy({ strict: false }).parse(['app', '--out'], envOf(['--out=s!']));

      expect(result.failure?.message).toBe("Option '--out' is force required");
      expect(result.failure?.chain().map((e) => e.code)).toEqual([
        ErrorCodes.OPT_FORCE_REQUIRED,
        ErrorCodes.MISSING_ARGUMENT,
      ]);
    });
  });

  describe('force-required options', () => {
    it('should chain a missing required option to the failure of the same option', () => {
      const result = new ForwardPolicy({ strict: false }).parse(['app', '--count=abc'], envOf(['--count=i!']));

      expect(result.ok).toBe(false);
      expect(result.failure?.message).toBe("Option '--count' is force required");
      expect(result.failure?.chain().map((e) => e.message)).toEqual([
        "Option '--count' is force required",
        "Invalid value for option '--count': 'abc' is not an integer",
      ]);
      expect(result.failures.map((f) => f.code)).toEqual([ErrorCodes.INVALID_VALUE]);
    });

    it('should report a missing command', () => {
      const result = new ForwardPolicy().parse(['app'], envOf(['build=c']));

      expect(result.failure?.code).toBe(ErrorCodes.CMD_FORCE_REQUIRED);
      expect(result.failure?.message).toBe("CMD 'build' is force required");
    });
  });

  describe('NOA pass', () => {
    it('should bind the command at position 1 and positionals by index', () => {
      const env = envOf(['build=c', 'input=s@2']);

      const result = new ForwardPolicy().parse(['app', 'build', 'src'], env);

      expect(result.ok).toBe(true);
      expect(result.bindings).toEqual([
        { uid: 0, name: 'build', style: 'cmd', index: 1, value: true, raw: 'build' },
        { uid: 1, name: 'input', style: 'pos', index: 2, value: 'src', raw: 'src' },
      ]);
    });

    it('should resolve backward indexes against the NOA total', () => {
      const env = envOf(['last=s@-1']);

      const result = new ForwardPolicy().parse(['app', 'a', '--', 'b'], env);

      expect(result.noa).toEqual(['app', 'a', '--', 'b']);
      expect(result.bindings).toEqual([{ uid: 0, name: 'last', style: 'pos', index: 3, value: 'b', raw: 'b' }]);
    });

    it('should bind a positional once per matching position', () => {
      const env = envOf(['files=s@1..']);
      env.set.add('--tag=s');

      const result = new ForwardPolicy().parse(['app', 'a', '--tag', 't', 'b'], env);

      expect(result.bindings.map((b) => [b.name, b.value])).toEqual([
        ['--tag', 't'],
        ['files', 'a'],
        ['files', 'b'],
      ]);
    });

    it('should hand the program name to main options', () => {
      const env = envOf(['entry=m']);
      env.invoker.on(0, (ctx) => `${ctx.value} with ${ctx.total - 1} argument(s)`);

      const result = new ForwardPolicy().parse(['app', 'x', 'y'], env);

      expect(result.bindings).toEqual([
        { uid: 0, name: 'entry', style: 'main', index: 0, value: 'app with 2 argument(s)', raw: 'app' },
      ]);
    });
  });

  describe('callbacks', () => {
    it('should see values stored before the invocation', () => {
      const seen: string[][] = [];
      const set = new OptionSet();
      set.add('--tag=s', { action: 'app', default: ['base'] });
      const env: ParseEnv = { set, invoker: new Invoker(), styles: new StyleCatalog() };
      env.invoker.on(0, (ctx) => {
        seen.push(ctx.prior.map(String));
        return ctx.value;
      });

      new ForwardPolicy().parse(['app', '--tag', 'a', '--tag=b'], env);

      expect(seen).toEqual([['base'], ['base', 'a']]);
      expect(set.get(0).getValues()).toEqual(['base', 'a', 'b']);
    });

    it('should store the value a callback returns', () => {
      const env = envOf(['--name=s']);
      env.invoker.on(0, (ctx) => String(ctx.value).toUpperCase());

      const result = new ForwardPolicy().parse(['app', '--name', 'x'], env);

      expect(result.bindings[0]?.value).toBe('X');
      expect(env.set.get(0).value).toBe('X');
    });

    it('should treat a refused callback as no match', () => {
      const env = envOf(['--name=s']);
      env.invoker.on(0, () => undefined);

      const strict = new ForwardPolicy().parse(['app', '--name=x'], env);
      const lenient = new ForwardPolicy({ strict: false }).parse(['app', '--name=x'], env);

      expect(strict.failure?.message).toBe("Can not find option '--name=x'");
      expect(lenient.ok).toBe(true);
      expect(lenient.noa).toEqual(['app', '--name=x']);
      expect(env.set.get(0).matched).toBe(false);
    });

    it('should record a callback failure and chain it to its reason', () => {
      const env = envOf(['--name=s']);
      env.invoker.on(0, () => {
        throw new MatchFailure(ErrorCodes.INVALID_VALUE, 'reserved name');
      });

      const result = new ForwardPolicy().parse(['app', '--name=root'], env);

      expect(result.failures.map((f) => f.message)).toEqual(["Failed to invoke option '--name': reserved name"]);
      expect(result.failure?.chain().map((e) => e.code)).toEqual([
        ErrorCodes.OPTION_NOT_FOUND,
        ErrorCodes.INVOKE_FAILED,
        ErrorCodes.INVALID_VALUE,
      ]);
    });

    it('should propagate errors that are not match failures', () => {
      const env = envOf(['--name=s']);
      env.invoker.on(0, () => {
        throw new TypeError('boom');
      });

      expect(() => new ForwardPolicy().parse(['app', '--name=x'], env)).toThrow('boom');
    });

    it('should turn the remaining arguments into NOAs on stop', () => {
      const env = envOf(['--exec=b', '--count=i']);
      env.invoker.on(0, (ctx) => {
        ctx.stop();
        return ctx.value;
      });

      const result = new ForwardPolicy().parse(['app', '--exec', '--count', '3'], env);

      expect(result.ok).toBe(true);
      expect(result.bindings.map((b) => b.name)).toEqual(['--exec']);
      expect(result.noa).toEqual(['app', '--count', '3']);
    });

    it('should leave later positions unbound when a positional stops', () => {
      const env = envOf(['files=s@1..']);
      env.invoker.on(0, (ctx) => {
        ctx.stop();
        return ctx.value;
      });

      const result = new ForwardPolicy().parse(['app', 'x', 'y'], env);

      expect(result.ok).toBe(true);
      expect(result.bindings.map((b) => [b.name, b.value])).toEqual([['files', 'x']]);
      expect(env.set.get(0).getValues()).toEqual(['x']);
    });

    it('should end the parse successfully on quit', () => {
      const env = envOf(['--help=b', '--out=s!']);
      env.invoker.on(0, (ctx) => {
        ctx.quit();
        return ctx.value;
      });

      const result = new ForwardPolicy().parse(['app', '--help', '--bogus'], env);

      expect(result.ok).toBe(true);
      expect(result.failure).toBeUndefined();
      expect(result.bindings.map((b) => b.name)).toEqual(['--help']);
      expect(result.noa).toEqual(['app']);
    });
  });

  describe('overloading', () => {
    it('should fall through to the next option with the same name', () => {
      const env = envOf(['--level=i', '--level=s']);

      const result = new ForwardPolicy({ overload: true }).parse(['app', '--level=high'], env);

      expect(result.ok).toBe(true);
      expect(result.bindings).toEqual([{ uid: 1, name: '--level', style: 'argument', value: 'high', raw: 'high' }]);
      expect(result.failures.map((f) => f.code)).toEqual([ErrorCodes.INVALID_VALUE]);
    });

    it('should stop at the first rejecting option without overloading', () => {
      const env = envOf(['--level=i', '--level=s']);

      const result = new ForwardPolicy().parse(['app', '--level=high'], env);

      expect(result.ok).toBe(false);
      expect(result.failure?.chain().map((e) => e.code)).toEqual([
        ErrorCodes.OPTION_NOT_FOUND,
        ErrorCodes.INVALID_VALUE,
      ]);
    });
  });

  describe('combined options', () => {
    const styles: UserStyle[] = ['equal-with-value', 'argument', 'boolean', 'combined-option'];

    it('should bind every character', () => {
      const env = envOf(['-x=b', '-y=b'], styles);

      const result = new ForwardPolicy().parse(['app', '-xy'], env);

      expect(result.bindings).toEqual([
        { uid: 0, name: '-x', style: 'combined', value: true, raw: 'true' },
        { uid: 1, name: '-y', style: 'combined', value: true, raw: 'true' },
      ]);
    });

    it('should bind nothing when one character is unknown', () => {
      const env = envOf(['-x=b', '-y=b'], styles);

      const result = new ForwardPolicy().parse(['app', '-xz'], env);

      expect(result.failure?.message).toBe("Can not find option '-xz'");
      expect(env.set.get(0).matched).toBe(false);
    });

    it('should roll back every character when one callback refuses', () => {
      const env = envOf(['-x=b', '-y=b'], styles);
      env.invoker.on(1, () => undefined);

      const result = new ForwardPolicy({ strict: false }).parse(['app', '-xy'], env);

      expect(result.bindings).toEqual([]);
      expect(result.noa).toEqual(['app', '-xy']);
      expect(env.set.get(0).matched).toBe(false);
      expect(env.set.get(0).value).toBe(false);
    });
  });

  describe('deactivation', () => {
    it('should store false for a deactivated option', () => {
      const env = envOf(['--/color=b']);

      const result = new ForwardPolicy().parse(['app', '--/color'], env);

      expect(result.bindings).toEqual([{ uid: 0, name: '--color', style: 'boolean', value: false, raw: 'true' }]);
    });

    it('should abort when the option cannot be deactivated', () => {
      const result = new ForwardPolicy().parse(['app', '--/debug'], envOf(['--debug=b']));

      expect(result.ok).toBe(false);
      expect(result.failure?.code).toBe(ErrorCodes.DEACTIVATE_NOT_SUPPORTED);
    });
  });

  it('should reset option state between parses', () => {
    const env = envOf(['--name=s']);
    const policy = new ForwardPolicy();

    policy.parse(['app', '--name', 'x'], env);
    policy.parse(['app'], env);

    expect(env.set.get(0).matched).toBe(false);
    expect(env.set.get(0).value).toBeUndefined();
  });
});
