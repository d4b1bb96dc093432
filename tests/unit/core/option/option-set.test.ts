/**
 * Tests for the option registry.
 */
import { describe, it, expect } from 'vitest';
import { OptionSet } from '../../../../src/core/option/option-set.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('OptionSet', () => {
  describe('add', () => {
    it('should assign uids in registration order', () => {
      const set = new OptionSet();
      expect(set.add('--a')).toBe(0);
      expect(set.add('--b')).toBe(1);
      expect(set.size).toBe(2);
    });

    it('should split the prefix from option names and aliases', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('--count;-c=i'));

      expect(opt.prefix).toBe('--');
      expect(opt.name).toBe('count');
      expect(opt.aliases).toEqual([{ prefix: '-', name: 'c' }]);
      expect(opt.displayName).toBe('--count');
    });

    it('should apply option defaults', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('--name'));

      expect(opt.kind).toBe('opt');
      expect(opt.valueType).toBe('str');
      expect(opt.styles).toEqual(['argument']);
      expect(opt.force).toBe(false);
      expect(opt.action).toBe('set');
      expect(opt.index).toEqual({ kind: 'null' });
      expect(opt.getValues()).toEqual([]);
    });

    it('should give boolean options boolean, combined and flag styles with a false default', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('-v=b'));

      expect(opt.styles).toEqual(['boolean', 'combined', 'flag']);
      expect(opt.value).toBe(false);
      expect(opt.deactivatable).toBe(false);
    });

    it('should mark options declared with the deactivation marker', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('--/color=b'));

      expect(opt.name).toBe('color');
      expect(opt.deactivatable).toBe(true);
      expect(opt.value).toBe(true);
    });

    it('should apply command, positional and main defaults', () => {
      const set = new OptionSet();
      const cmd = set.get(set.add('build=c'));
      const pos = set.get(set.add('input@1'));
      const main = set.get(set.add('entry=m'));

      expect(cmd.prefix).toBeUndefined();
      expect(cmd.valueType).toBe('bool');
      expect(cmd.force).toBe(true);
      expect(cmd.index).toEqual({ kind: 'forward', offset: 1 });

      expect(pos.valueType).toBe('bool');
      expect(pos.force).toBe(false);
      expect(pos.styles).toEqual(['pos']);

      expect(main.valueType).toBe('any');
      expect(main.action).toBe('null');
      expect(main.index).toEqual({ kind: 'anywhere' });
    });

    it('should let overrides replace declared fields', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('--tag=s', { action: 'app', default: ['base'] }));

      expect(opt.action).toBe('app');
      expect(opt.getValues()).toEqual(['base']);
    });

    it('should accept an option object with a structured index', () => {
      const set = new OptionSet();
      const opt = set.get(set.add({ name: 'last', kind: 'pos', type: 'str', index: { kind: 'backward', offset: 1 } }));
      expect(opt.matchIndex(2, 3)).toBe(true);
    });

    it('should give names without a registered prefix the empty prefix', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('d=b'));
      expect(opt.prefix).toBe('');
      expect(opt.name).toBe('d');
    });

    it('should reject positionals without an index', () => {
      const set = new OptionSet();
      expect(() => set.add({ name: 'input', kind: 'pos' })).toThrow('positional options need an index');
    });

    it('should reject names carrying a value', () => {
      const set = new OptionSet();
      expect(() => set.add({ name: '--a=b' })).toThrow(ConfigError);
    });
  });

  describe('get', () => {
    it('should throw for unknown uids', () => {
      try {
        new OptionSet().get(4);
        expect.fail('expected a ConfigError');
      } catch (error) {
        expect(error instanceof ConfigError && error.code).toBe(ErrorCodes.UNKNOWN_OPTION);
      }
    });
  });

  describe('find', () => {
    it('should find options by name or alias, prefix included', () => {
      const set = new OptionSet();
      set.add('--count;-c=i');
      set.add('build=c');

      expect(set.find('--count')?.uid).toBe(0);
      expect(set.find('-c')?.uid).toBe(0);
      expect(set.find('-count')).toBeUndefined();
      expect(set.find('build')?.uid).toBe(1);
    });

    it('should list every option sharing a name', () => {
      const set = new OptionSet();
      set.add('--level=i');
      set.add('--level=s');
      expect(set.findAll('--level').map((opt) => opt.uid)).toEqual([0, 1]);
    });
  });

  describe('options', () => {
    it('should filter by kind in registration order', () => {
      const set = new OptionSet();
      set.add('--a');
      set.add('build=c');
      set.add('--b');

      expect(set.options('opt').map((opt) => opt.uid)).toEqual([0, 2]);
      expect(set.options().length).toBe(3);
      expect(set.has('cmd')).toBe(true);
      expect(set.has('main')).toBe(false);
    });
  });

  describe('prefixes', () => {
    it('should keep prefixes longest first', () => {
      expect(new OptionSet(['-', '+', '--']).prefixes).toEqual(['--', '-', '+']);
    });

    it('should resolve names with custom prefixes', () => {
      const set = new OptionSet(['+', '-']);
      const opt = set.get(set.add('+x=b'));
      expect(opt.prefix).toBe('+');
    });
  });

  describe('reset', () => {
    it('should restore defaults on every option', () => {
      const set = new OptionSet();
      const opt = set.get(set.add('--n=i', { default: 1 }));
      opt.store(5, '5');

      set.reset();

      expect(opt.getValues()).toEqual([1]);
      expect(opt.getRawValues()).toEqual([]);
      expect(opt.matched).toBe(false);
    });
  });
});
