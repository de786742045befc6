/**
 * PresenterState — the mutable state a presenter owns.
 *
 * The presenter mutates state on its own executor, then calls commit()
 * to broadcast. Only snapshot() copies ever leave this object; each copy
 * is an independent deep clone that is frozen before handing out, so no
 * two handles observe the same instance and no view can write back.
 *
 *   update() → changed = true
 *   commit   → clone(data) × handles → revision++, changed = false, initial = false
 *   snapshot → clone(data) → freeze → { revision, initial, data }
 */

import { encode, decode, Token, Type } from 'cborg';
import type { Snapshot } from '../core/types.js';

export type CloneFn<T> = (value: T) => T;

/**
 * Deep clone through a CBOR round trip. Supports plain objects, arrays,
 * strings, numbers, booleans, null, undefined and Uint8Array. Key order
 * is kept. Functions, Dates and Sets throw; class instances come back as
 * plain objects.
 */
export function cborClone<T>(value: T): T {
  return decode(
    encode(value, {
      // The default sorter reorders object keys.
      mapSorter: undefined,
      // -0 would otherwise be written as the integer 0.
      float64: true,
      typeEncoders: {
        number: (n: unknown) => (Object.is(n, -0) ? [new Token(Type.float, -0)] : null),
      },
    }),
  );
}

/** Recursively freeze a value in place and return it. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    if (ArrayBuffer.isView(value)) {
      // Typed arrays with elements cannot be frozen.
      return value;
    }
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
    Object.freeze(value);
  }
  return value;
}

export interface PresenterStateOptions<T> {
  /** Replaces the CBOR clone, e.g. for state containing Maps or Dates. */
  clone?: CloneFn<T>;
}

export class PresenterState<T> {
  private value: T;
  private changed = false;
  private initial = true;
  private _revision = 0;
  private readonly clone: CloneFn<T>;

  constructor(initial: T, options: PresenterStateOptions<T> = {}) {
    this.value = initial;
    this.clone = options.clone ?? cborClone;
  }

  /** Live state. Read-only by type; mutate through set() or update(). */
  get current(): Readonly<T> {
    return this.value;
  }

  /** Number of commits made so far. */
  get revision(): number {
    return this._revision;
  }

  /** Replace the state. */
  set(next: T): void {
    this.value = next;
    this.changed = true;
  }

  /** Mutate the state in place. */
  update(mutator: (draft: T) => void): void {
    mutator(this.value);
    this.changed = true;
  }

  /** Whether the state changed since the last commit. */
  isChanged(): boolean {
    return this.changed;
  }

  /** Whether the state has never been committed. */
  isInitial(): boolean {
    return this.initial;
  }

  /** Record a commit: advance the revision and clear both flags. */
  markCommitted(): void {
    this._revision++;
    this.changed = false;
    this.initial = false;
  }

  /** Take an independent, frozen copy of the current state. */
  snapshot(): Snapshot<T> {
    return this.copy(this._revision, this.initial);
  }

  /**
   * Take `count` copies as of the next revision, then record the commit.
   * If a copy throws, the state is left uncommitted and still changed.
   */
  commit(count: number): Snapshot<T>[] {
    const revision = this._revision + 1;
    const snapshots: Snapshot<T>[] = [];
    for (let i = 0; i < count; i++) {
      snapshots.push(this.copy(revision, false));
    }
    this.markCommitted();
    return snapshots;
  }

  toString(): string {
    return `PresenterState { revision=${this._revision}, changed=${this.changed}, initial=${this.initial} }`;
  }

  private copy(revision: number, initial: boolean): Snapshot<T> {
    return Object.freeze({ revision, initial, data: deepFreeze(this.clone(this.value)) });
  }
}
