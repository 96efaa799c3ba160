/**
 * Shared test fixtures.
 */

import avatarFixture from './fixtures/testAvatar.json';
import { createLogger } from '../logger';
import { parseAvatarDefinition } from '../engine/ability/schema';
import type { AvatarDefinition, EntityState, PredicateContext } from '../engine/ability/types';
import type { AbilityState } from '../engine/types';

export const TEST_AVATAR_ID = 10000001;

export function silentLogger() {
  return createLogger({ logLevel: 'debug', nodeEnv: 'test' });
}

export function loadTestAvatar(): AvatarDefinition {
  return parseAvatarDefinition(avatarFixture);
}

export function entity(
  overrides: Partial<{ altitude: number; hpRatio: number; abilityStates: AbilityState[] }> = {},
): EntityState {
  return {
    altitude: overrides.altitude ?? 0,
    hpRatio: overrides.hpRatio ?? 1,
    abilityStates: new Set(overrides.abilityStates ?? []),
  };
}

export function contextWithTarget(target: EntityState, self: EntityState = entity()): PredicateContext {
  return { self, target };
}
