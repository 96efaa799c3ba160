/**
 * Reverse lookup from identifier hashes to the strings they came from.
 *
 * Built once from every loaded ability configuration, then read-only:
 * `build` is the only way to create or fill an index.
 * Instances are explicit values: nothing here is process-global.
 */

import type { AbilityConfig, NameHash } from '../types';
import { abilityHash, toUnsignedHash } from '../hash';
import type { EngineErrorKind } from '../errors';
import defaultLogger, { type Logger } from '../../logger';

export const UNKNOWN_NAME = 'unknown';

export interface HashCollision {
  readonly hash: NameHash;
  readonly previous: string;
  readonly replacement: string;
}

export interface HashIndexOptions {
  /** Hash function; defaults to the ability identifier hash */
  readonly hash?: (name: string) => NameHash;
  readonly logger?: Logger;
}

export class AbilityHashIndex {
  private constructor(
    private readonly names: ReadonlyMap<NameHash, string>,
    private readonly recordedCollisions: readonly HashCollision[],
  ) {}

  /**
   * Index the ability name, every special name and every modifier name
   * of each configuration, in iteration order. When a different name
   * already owns a hash, the later name replaces it and the collision
   * is recorded.
   */
  static build(configs: Iterable<AbilityConfig>, options: HashIndexOptions = {}): AbilityHashIndex {
    const hashName = options.hash ?? abilityHash;
    const logger = options.logger ?? defaultLogger;
    const names = new Map<NameHash, string>();
    const collisions: HashCollision[] = [];

    const insert = (name: string): void => {
      const hash = toUnsignedHash(hashName(name));
      const previous = names.get(hash);

      if (previous !== undefined && previous !== name) {
        const collision: HashCollision = { hash, previous, replacement: name };
        collisions.push(collision);
        const kind: EngineErrorKind = 'HashCollision';
        logger.warn('ability_hash_collision', { kind, ...collision });
      }

      names.set(hash, name);
    };

    for (const config of configs) {
      insert(config.abilityName);
      for (const special of Object.keys(config.abilitySpecials ?? {})) {
        insert(special);
      }
      for (const modifier of Object.keys(config.modifiers ?? {})) {
        insert(modifier);
      }
    }

    logger.info('ability_hash_index_built', {
      entries: names.size,
      collisions: collisions.length,
    });
    return new AbilityHashIndex(names, Object.freeze(collisions));
  }

  /**
   * Find the string a hash was derived from. Signed hashes are accepted.
   */
  lookup(hash: number): string | undefined {
    return this.names.get(toUnsignedHash(hash));
  }

  /**
   * Like lookup, but returns "unknown" for hashes not in the index.
   */
  describe(hash: number): string {
    return this.lookup(hash) ?? UNKNOWN_NAME;
  }

  has(hash: number): boolean {
    return this.names.has(toUnsignedHash(hash));
  }

  get size(): number {
    return this.names.size;
  }

  get collisions(): readonly HashCollision[] {
    return this.recordedCollisions;
  }
}
