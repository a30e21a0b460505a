import { describe, it, expect, vi, beforeEach } from 'vitest';

import { LifecycleError, SubscriberError } from './errors.js';
import { AgentLifecycle } from './lifecycle.js';
import { StateMirrorAgent } from './state-mirror-agent.js';
import type { MirrorState, MirrorValue } from './types.js';

function entries(state: MirrorState | undefined): Array<[string, MirrorValue]> {
  return state ? Array.from(state) : [];
}

describe('StateMirrorAgent', () => {
  let mirror: StateMirrorAgent;

  beforeEach(() => {
    mirror = new StateMirrorAgent();
  });

  describe('broadcasting', () => {
    it('should deliver one snapshot per update in mutation order', async () => {
      // Given a mirror seeded with a single value and one subscriber
      await mirror.start({ value: 0 });
      const received: MirrorState[] = [];
      mirror.subscribe((snapshot) => received.push(snapshot));

      // When two keys are updated
      mirror.update('value', 1);
      mirror.update('another_value', 42);

      // Then the subscriber saw both full snapshots in order
      expect(received.map(entries)).toEqual([
        [['value', 1]],
        [
          ['value', 1],
          ['another_value', 42],
        ],
      ]);
      expect(mirror.broadcastCount).toBe(2);
    });

    it('should notify every subscriber exactly once per update', async () => {
      await mirror.start();
      const first = vi.fn();
      const second = vi.fn();
      mirror.subscribe(first);
      mirror.subscribe({ receive: second });

      mirror.update('a', 1);
      mirror.update('b', 2);
      mirror.update('a', 3);

      expect(first).toHaveBeenCalledTimes(3);
      expect(second).toHaveBeenCalledTimes(3);
      expect(second).toHaveBeenLastCalledWith(
        new Map([
          ['a', 3],
          ['b', 2],
        ]),
      );
    });

    it('should not broadcast the initial state', async () => {
      await mirror.start({ seeded: true });
      const observer = vi.fn();
      mirror.subscribe(observer);

      expect(observer).not.toHaveBeenCalled();
      expect(mirror.broadcastCount).toBe(0);
      expect(entries(mirror.state)).toEqual([['seeded', true]]);
    });

    it('should not replay earlier updates to late subscribers', async () => {
      await mirror.start();
      mirror.update('early', 1);

      const late = vi.fn();
      mirror.subscribe(late);
      mirror.update('later', 2);

      expect(late).toHaveBeenCalledTimes(1);
      expect(late).toHaveBeenCalledWith(
        new Map([
          ['early', 1],
          ['later', 2],
        ]),
      );
    });
  });

  describe('keys', () => {
    it('should keep integer-like keys in insertion order', async () => {
      // Given a mirror where a named key arrives before numeric ones
      await mirror.start({ b: 0 });

      // When numeric-looking keys are added afterwards
      mirror.update('12', 1);
      mirror.update('0', 2);

      // Then they follow the named key
      expect(Array.from(mirror.state.keys())).toEqual(['b', '12', '0']);
    });

    it('should store and broadcast object builtin names like any other key', async () => {
      // Given a subscribed mirror
      await mirror.start();
      const received: MirrorState[] = [];
      mirror.subscribe((snapshot) => received.push(snapshot));

      // When updating keys that name object builtins
      mirror.update('__proto__', { x: 1 });
      mirror.update('y', 2);

      // Then both keys persist and every snapshot carries them
      expect(received.map(entries)).toEqual([
        [['__proto__', { x: 1 }]],
        [
          ['__proto__', { x: 1 }],
          ['y', 2],
        ],
      ]);
      expect(mirror.state.get('__proto__')).toEqual({ x: 1 });
    });

    it('should read builtin names from a plain seed object', async () => {
      const seed: Record<string, MirrorValue> = JSON.parse('{"__proto__": 1, "constructor": 2}');

      await mirror.start(seed);

      expect(entries(mirror.state)).toEqual([
        ['__proto__', 1],
        ['constructor', 2],
      ]);
    });

    it('should accept a map as seed', async () => {
      await mirror.start(
        new Map<string, MirrorValue>([
          ['7', 'seven'],
          ['a', 'first'],
        ]),
      );

      expect(Array.from(mirror.state.keys())).toEqual(['7', 'a']);
    });
  });

  describe('isolation', () => {
    it('should hand each subscriber its own copy', async () => {
      // Given two subscribers where the first vandalizes its snapshot
      await mirror.start();
      const seen: MirrorState[] = [];
      mirror.subscribe((snapshot) => {
        snapshot.set('value', 'tampered');
        seen.push(snapshot);
      });
      mirror.subscribe((snapshot) => seen.push(snapshot));

      // When an update is broadcast
      mirror.update('value', 7);

      // Then neither the mirror nor the second subscriber observed the change
      expect(entries(seen[1])).toEqual([['value', 7]]);
      expect(seen[0]).not.toBe(seen[1]);
      expect(mirror.state.get('value')).toBe(7);
    });

    it('should copy nested values on the way in', async () => {
      await mirror.start();
      const nested = { level: 1, tags: ['a'] };

      mirror.update('nested', nested);
      nested.level = 2;
      nested.tags.push('b');

      expect(mirror.state.get('nested')).toEqual({ level: 1, tags: ['a'] });
    });

    it('should copy the seed deeply', async () => {
      // Given a seed with a nested object
      const inner = { x: 1 };
      const seed: Record<string, MirrorValue> = { value: 0, nested: inner };
      await mirror.start(seed);

      // When the caller mutates the seed afterwards
      seed['value'] = 99;
      inner.x = 2;

      // Then the mirror kept the values it started with
      expect(entries(mirror.state)).toEqual([
        ['value', 0],
        ['nested', { x: 1 }],
      ]);
    });

    it('should return a fresh copy on every read', async () => {
      await mirror.start({ value: 1 });

      const first = mirror.snapshot();
      first.set('value', 5);
      first.set('extra', true);

      expect(entries(mirror.snapshot())).toEqual([['value', 1]]);
    });
  });

  describe('subscriber failures', () => {
    it('should keep notifying after a subscriber throws and report afterwards', async () => {
      // Given a throwing subscriber registered before a healthy one
      await mirror.start();
      mirror.subscribe(() => {
        throw new Error('observer exploded');
      });
      const healthy = vi.fn();
      mirror.subscribe(healthy);

      // When an update is broadcast
      let caught: unknown;
      try {
        mirror.update('value', 1);
      } catch (error) {
        caught = error;
      }

      // Then the healthy subscriber still ran and the failure is aggregated
      expect(healthy).toHaveBeenCalledWith(new Map([['value', 1]]));
      expect(caught).toBeInstanceOf(SubscriberError);
      if (caught instanceof SubscriberError) {
        expect(caught.key).toBe('value');
        expect(caught.failures.map((failure) => failure.index)).toEqual([0]);
        expect(caught.message).toBe(
          '1 subscriber(s) failed on update of "value":\n  - subscriber #0: observer exploded',
        );
      }
      // And the mutation is kept
      expect(entries(mirror.state)).toEqual([['value', 1]]);
    });
  });

  describe('lifecycle', () => {
    it('should reject use before start', () => {
      expect(() => mirror.update('value', 1)).toThrow(LifecycleError);
      expect(() => mirror.subscribe(vi.fn())).toThrow(LifecycleError);
      expect(() => mirror.snapshot()).toThrow(
        'StateMirrorAgent: cannot read state while created',
      );
    });

    it('should reject mutation after stop but keep state readable', async () => {
      await mirror.start();
      mirror.subscribe(vi.fn());
      mirror.update('value', 3);

      await mirror.stop();

      expect(mirror.status).toBe(AgentLifecycle.STOPPED);
      expect(() => mirror.update('value', 4)).toThrow(
        'StateMirrorAgent: cannot update while stopped',
      );
      expect(() => mirror.subscribe(vi.fn())).toThrow(LifecycleError);
      expect(mirror.subscriberCount).toBe(0);
      expect(entries(mirror.state)).toEqual([['value', 3]]);
    });
  });
});
