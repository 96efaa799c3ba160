/**
 * Special overrides addressed by hashed identifiers.
 *
 * Clients refer to abilities and specials by their 32-bit hashes. The
 * hash index recovers the configuration keys before the depot is touched.
 */

import type { SkillDepot } from '../types';
import { EngineError } from '../errors';
import { getSpecial } from './depot';
import type { AbilityHashIndex } from './hashIndex';
import type { ApplyResult } from './types';

function unknownHash(role: 'ability' | 'special', hash: number): ApplyResult {
  return {
    status: 'FAILED',
    error: new EngineError('UnknownHash', `No ${role} name is known for hash ${hash >>> 0}`, {
      role,
      hash: hash >>> 0,
    }),
  };
}

/**
 * Overwrite one special with a client-supplied value.
 */
export function overrideSpecialByHash(
  depot: SkillDepot,
  index: AbilityHashIndex,
  abilityNameHash: number,
  specialNameHash: number,
  value: number,
): ApplyResult {
  const abilityName = index.lookup(abilityNameHash);
  if (abilityName === undefined) return unknownHash('ability', abilityNameHash);

  const specialName = index.lookup(specialNameHash);
  if (specialName === undefined) return unknownHash('special', specialNameHash);

  const current = getSpecial(depot, abilityName, specialName);
  if (!current.ok) return { status: 'FAILED', error: current.error };

  depot.abilitySpecials.get(abilityName)?.set(specialName, Math.fround(value));
  return { status: 'APPLIED' };
}
