import { describe, it, expect } from 'vitest';
import { abilityHash } from '../hash';
import { createSkillDepot, toDepotSnapshot } from './depot';
import { AbilityHashIndex } from './hashIndex';
import { overrideSpecialByHash } from './overrides';
import { loadTestAvatar, silentLogger } from '../../test/helpers';

function setup() {
  const { abilities } = loadTestAvatar();
  return {
    depot: createSkillDepot(abilities),
    index: AbilityHashIndex.build(abilities, { logger: silentLogger() }),
  };
}

describe('overrideSpecialByHash', () => {
  it('overwrites the special at single precision', () => {
    const { depot, index } = setup();
    const result = overrideSpecialByHash(
      depot,
      index,
      abilityHash('Avatar_Test_ElementalArt'),
      abilityHash('E_Ratio'),
      2.3,
    );

    expect(result).toEqual({ status: 'APPLIED' });
    expect(depot.abilitySpecials.get('Avatar_Test_ElementalArt')?.get('E_Ratio')).toBe(Math.fround(2.3));
  });

  it('accepts signed hashes', () => {
    const { depot, index } = setup();
    overrideSpecialByHash(depot, index, -1114753717, -1229036267, 4);
    expect(depot.abilitySpecials.get('Avatar_Test_ElementalArt')?.get('E_Ratio')).toBe(4);
  });

  it('fails with UnknownHash for an unindexed ability hash', () => {
    const { depot, index } = setup();
    const before = toDepotSnapshot(depot);
    const result = overrideSpecialByHash(depot, index, 12345, abilityHash('E_Ratio'), 4);

    expect(result.status).toBe('FAILED');
    if (result.status === 'FAILED') {
      expect(result.error.kind).toBe('UnknownHash');
      expect(result.error.message).toBe('No ability name is known for hash 12345');
      expect(result.error.details).toEqual({ role: 'ability', hash: 12345 });
    }
    expect(toDepotSnapshot(depot)).toEqual(before);
  });

  it('fails with UnknownHash for an unindexed special hash', () => {
    const { depot, index } = setup();
    const result = overrideSpecialByHash(depot, index, abilityHash('Avatar_Test_ElementalArt'), -1, 4);

    expect(result.status).toBe('FAILED');
    if (result.status === 'FAILED') {
      expect(result.error.message).toBe('No special name is known for hash 4294967295');
    }
  });

  it('fails with UnknownSpecial when the special belongs to another ability', () => {
    const { depot, index } = setup();
    const result = overrideSpecialByHash(
      depot,
      index,
      abilityHash('Avatar_Test_ElementalArt'),
      abilityHash('Q_Ratio'),
      4,
    );

    expect(result.status).toBe('FAILED');
    if (result.status === 'FAILED') expect(result.error.kind).toBe('UnknownSpecial');
    expect(depot.abilitySpecials.get('Avatar_Test_ElementalArt')?.has('Q_Ratio')).toBe(false);
  });

  it('fails with UnknownAbility when the name is indexed but absent from the depot', () => {
    const { abilities } = loadTestAvatar();
    const index = AbilityHashIndex.build(abilities, { logger: silentLogger() });
    const depot = createSkillDepot(abilities.filter(a => a.abilityName !== 'Avatar_Test_Passive'));

    const result = overrideSpecialByHash(
      depot,
      index,
      abilityHash('Avatar_Test_Passive'),
      abilityHash('Heal_Bonus'),
      1,
    );
    expect(result.status).toBe('FAILED');
    if (result.status === 'FAILED') expect(result.error.kind).toBe('UnknownAbility');
  });
});
