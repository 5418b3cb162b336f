/**
 * Unit tests for ChannelRegistry and Channel
 */

import { ChannelRegistry } from '../../src/channels/channel-registry';
import {
  ChannelExistsError,
  ChannelNameError,
  ChannelNotFoundError,
  ChannelReadOnlyError,
  ChannelValueError,
} from '../../src/errors';

describe('ChannelRegistry', () => {
  let registry: ChannelRegistry;

  beforeEach(() => {
    registry = new ChannelRegistry();
  });

  describe('create', () => {
    it('creates a channel with its default value', () => {
      const channel = registry.create('SPARC:CONTROL:TEST:COUNT', { type: 'int' });

      expect(channel.value).toBe(0);
      expect(channel.writable).toBe(false);
      expect(registry.has('SPARC:CONTROL:TEST:COUNT')).toBe(true);
      expect(registry.size).toBe(1);
    });

    it('rejects duplicate names', () => {
      registry.create('A:B', { type: 'bool' });

      expect(() => registry.create('A:B', { type: 'bool' })).toThrow(ChannelExistsError);
    });

    it('rejects names containing whitespace', () => {
      expect(() => registry.create('A:B C', { type: 'bool' })).toThrow(ChannelNameError);
      expect(() => registry.create('', { type: 'bool' })).toThrow(ChannelNameError);
    });
  });

  describe('lookup', () => {
    it('throws for unknown channels on get', () => {
      expect(() => registry.get('NOPE')).toThrow(ChannelNotFoundError);
      expect(registry.find('NOPE')).toBeUndefined();
    });

    it('lists channels ordered by name', () => {
      registry.create('B', { type: 'int' });
      registry.create('A', { type: 'int' });
      registry.create('C', { type: 'int' });

      expect(registry.list().map((channel) => channel.name)).toEqual(['A', 'B', 'C']);
    });
  });

  describe('value coercion', () => {
    it('coerces int channels from numeric strings and booleans', () => {
      registry.create('I', { type: 'int' });

      registry.set('I', '42');
      expect(registry.get('I').value).toBe(42);

      registry.set('I', true);
      expect(registry.get('I').value).toBe(1);
    });

    it('coerces bool channels from 0/1 and strings', () => {
      registry.create('B', { type: 'bool' });

      registry.set('B', 1);
      expect(registry.get('B').value).toBe(true);

      registry.set('B', 'false');
      expect(registry.get('B').value).toBe(false);
    });

    it('rejects values that do not fit the type', () => {
      registry.create('F', { type: 'float', initial: 1.5 });

      expect(() => registry.set('F', 'abc')).toThrow(ChannelValueError);
      expect(() => registry.set('F', 'abc')).toThrow('Invalid value for F: expected float, got "abc"');
      expect(registry.get('F').value).toBe(1.5);
    });

    it('rejects fractional values on int channels', () => {
      registry.create('I', { type: 'int' });

      expect(() => registry.set('I', 2.5)).toThrow(ChannelValueError);
    });

    it('truncates strings to maxLength', () => {
      registry.create('MSG', { type: 'string', maxLength: 5 });

      registry.set('MSG', 'abcdefgh');
      expect(registry.get('MSG').value).toBe('abcde');
    });
  });

  describe('write', () => {
    it('refuses external writes to read-only channels', () => {
      registry.create('RO', { type: 'int' });

      expect(() => registry.write('RO', 3)).toThrow(ChannelReadOnlyError);
    });

    it('allows task-side updates of read-only channels', () => {
      registry.create('RO', { type: 'int' });

      registry.set('RO', 3);
      expect(registry.get('RO').value).toBe(3);
    });

    it('invokes the update callback once with the coerced value', () => {
      const onUpdate = jest.fn();
      registry.create('W', { type: 'int', writable: true, onUpdate });

      const channel = registry.write('W', '7');

      expect(onUpdate).toHaveBeenCalledTimes(1);
      expect(onUpdate).toHaveBeenCalledWith(7, channel);
      expect(channel.value).toBe(7);
    });

    it('does not invoke the update callback on task-side updates', () => {
      const onUpdate = jest.fn();
      registry.create('W', { type: 'int', writable: true, onUpdate });

      registry.set('W', 5);

      expect(onUpdate).not.toHaveBeenCalled();
    });

    it('lets the callback reset a momentary channel', () => {
      registry.create('CMD', {
        type: 'bool',
        writable: true,
        onUpdate: (value, channel) => {
          if (value === true) {
            channel.set(false);
          }
        },
      });

      registry.write('CMD', true);

      expect(registry.get('CMD').value).toBe(false);
    });
  });

  describe('snapshot', () => {
    it('includes metadata that was set', () => {
      registry.create('S', {
        type: 'int',
        initial: 2,
        enumStrings: ['A', 'B', 'C'],
        description: 'state',
      });

      expect(registry.get('S').snapshot()).toEqual({
        name: 'S',
        type: 'int',
        value: 2,
        writable: false,
        description: 'state',
        enumStrings: ['A', 'B', 'C'],
      });
    });
  });

  describe('namespace', () => {
    it('scopes names to its prefix', () => {
      const ns = registry.namespace('SPARC:CONTROL:IOCMNG');

      ns.create('ENABLE', { type: 'bool', initial: true });
      ns.set('ENABLE', false);

      expect(ns.fullName('ENABLE')).toBe('SPARC:CONTROL:IOCMNG:ENABLE');
      expect(registry.get('SPARC:CONTROL:IOCMNG:ENABLE').value).toBe(false);
      expect(ns.value('ENABLE')).toBe(false);
      expect(ns.has('ENABLE')).toBe(true);
      expect(ns.names()).toEqual(['ENABLE']);
    });

    it('keeps namespaces of different tasks apart', () => {
      const a = registry.namespace('P:A');
      const b = registry.namespace('P:B');

      a.create('STATUS', { type: 'int' });
      b.create('STATUS', { type: 'int' });
      a.set('STATUS', 4);

      expect(b.value('STATUS')).toBe(0);
      expect(b.has('ENABLE')).toBe(false);
    });
  });
});
