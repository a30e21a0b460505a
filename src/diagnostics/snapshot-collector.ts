import type { MirrorState, MirrorValue, SnapshotObserver } from '../agents/types.js';

/**
 * Observer that keeps every snapshot it receives, in delivery order
 */
export class SnapshotCollector implements SnapshotObserver {
  private readonly received: MirrorState[] = [];

  receive(snapshot: MirrorState): void {
    this.received.push(snapshot);
  }

  get snapshots(): readonly MirrorState[] {
    return this.received;
  }

  get count(): number {
    return this.received.length;
  }

  latest(): MirrorState | undefined {
    return this.received[this.received.length - 1];
  }

  /**
   * Value of one key across every snapshot, undefined where it was not yet set
   */
  series(key: string): Array<MirrorValue | undefined> {
    return this.received.map((snapshot) => snapshot.get(key));
  }

  clear(): void {
    this.received.length = 0;
  }
}
