export type MirrorValue =
  | number
  | string
  | boolean
  | null
  | readonly MirrorValue[]
  | { readonly [key: string]: MirrorValue };

/**
 * Mirror contents in insertion order. A Map, so integer-like keys keep their
 * place and no key is special.
 */
export type MirrorState = Map<string, MirrorValue>;

/**
 * Initial contents accepted by the mirror: a map or a plain object
 */
export type MirrorSeed = ReadonlyMap<string, MirrorValue> | Readonly<Record<string, MirrorValue>>;

/**
 * Receives a private copy of the mirror after every mutation
 */
export interface SnapshotObserver {
  receive(snapshot: MirrorState): void;
}

export type SnapshotCallback = (snapshot: MirrorState) => void;
