import { BaseAgent } from './base-agent.js';
import { SubscriberError, type SubscriberFailure } from './errors.js';
import { AgentLifecycle } from './lifecycle.js';
import type {
  MirrorSeed,
  MirrorState,
  MirrorValue,
  SnapshotCallback,
  SnapshotObserver,
} from './types.js';

function isMapSeed(seed: MirrorSeed): seed is ReadonlyMap<string, MirrorValue> {
  return seed instanceof Map;
}

function seedEntries(seed: MirrorSeed): Array<[string, MirrorValue]> {
  return isMapSeed(seed) ? Array.from(seed.entries()) : Object.entries(seed);
}

function toObserver(subscriber: SnapshotObserver | SnapshotCallback): SnapshotObserver {
  return typeof subscriber === 'function' ? { receive: subscriber } : subscriber;
}

/**
 * Owns a keyed state snapshot and rebroadcasts it on every mutation.
 *
 * Each observer receives its own deep copy, so nothing an observer does can
 * reach the mirror or another observer's view.
 */
export class StateMirrorAgent extends BaseAgent<[initialState?: MirrorSeed]> {
  private values: MirrorState = new Map();
  private observers: SnapshotObserver[] = [];
  private broadcasts = 0;

  constructor() {
    super('StateMirrorAgent');
  }

  protected onStart(initialState: MirrorSeed = {}): void {
    this.values = new Map(structuredClone(seedEntries(initialState)));
  }

  protected onStop(): void {
    this.observers = [];
  }

  subscribe(subscriber: SnapshotObserver | SnapshotCallback): void {
    this.assertStarted('subscribe');
    this.observers.push(toObserver(subscriber));
  }

  /**
   * Set one key and notify every observer in registration order.
   * @throws SubscriberError after all observers were attempted, if any threw.
   * The mutation itself is kept.
   */
  update(key: string, value: MirrorValue): void {
    this.assertStarted('update');

    this.values.set(key, structuredClone(value));
    this.broadcasts++;

    const failures: SubscriberFailure[] = [];
    this.observers.forEach((observer, index) => {
      try {
        observer.receive(structuredClone(this.values));
      } catch (error) {
        failures.push({ index, error });
      }
    });

    if (failures.length > 0) {
      this.logger.warn(`${failures.length} subscriber(s) failed`, {
        agent: this.name,
        event: 'subscriber-error',
        key,
      });
      throw new SubscriberError(key, failures);
    }
  }

  /**
   * Copy of the current state. Stays readable after stop for post-mortem checks.
   */
  snapshot(): MirrorState {
    this.assertIn('read state', [AgentLifecycle.STARTED, AgentLifecycle.STOPPED]);
    return structuredClone(this.values);
  }

  get state(): MirrorState {
    return this.snapshot();
  }

  get subscriberCount(): number {
    return this.observers.length;
  }

  get broadcastCount(): number {
    return this.broadcasts;
  }
}
