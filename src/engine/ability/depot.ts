/**
 * Skill depot construction, lookup and snapshotting.
 *
 * Specials and cooldowns are stored at single precision; every write,
 * including construction and snapshot restore, goes through `Math.fround`.
 */

import type {
  AbilityConfig,
  AbilityName,
  SkillDefinition,
  SkillDepot,
  SkillDepotSnapshot,
  SkillState,
  SpecialName,
  TalentType,
} from '../types';
import { TALENT_TYPES } from '../types';
import { EngineError, failed, resolved, type Resolution } from '../errors';

// =============================================================================
// Construction
// =============================================================================

export function createEmptyDepot(): SkillDepot {
  return {
    abilitySpecials: new Map(),
    skills: new Map(),
    talentParams: new Map(),
    extraLevels: new Map(),
  };
}

/**
 * Build the specials table of an ability from its configured defaults.
 */
export function specialsFromConfig(config: AbilityConfig): Map<SpecialName, number> {
  const specials = new Map<SpecialName, number>();
  for (const [name, value] of Object.entries(config.abilitySpecials ?? {})) {
    specials.set(name, Math.fround(value));
  }
  return specials;
}

/**
 * Create a depot holding the given abilities and skills at their default values.
 * A later ability with the same name replaces an earlier one.
 */
export function createSkillDepot(
  abilities: Iterable<AbilityConfig>,
  skills: Iterable<SkillDefinition> = [],
): SkillDepot {
  const depot = createEmptyDepot();
  for (const ability of abilities) {
    depot.abilitySpecials.set(ability.abilityName, specialsFromConfig(ability));
  }
  for (const skill of skills) {
    depot.skills.set(skill.skillId, {
      cdTime: Math.fround(skill.cdTime),
      maxChargeNum: skill.maxChargeNum,
    });
  }
  return depot;
}

/**
 * Deep copy a depot. The clone shares no mutable state with the source.
 */
export function cloneSkillDepot(depot: SkillDepot): SkillDepot {
  const clone = createEmptyDepot();
  for (const [ability, specials] of depot.abilitySpecials) {
    clone.abilitySpecials.set(ability, new Map(specials));
  }
  for (const [skillId, skill] of depot.skills) {
    clone.skills.set(skillId, { ...skill });
  }
  for (const [ability, params] of depot.talentParams) {
    clone.talentParams.set(ability, new Set(params));
  }
  for (const [talentType, level] of depot.extraLevels) {
    clone.extraLevels.set(talentType, level);
  }
  return clone;
}

// =============================================================================
// Lookup
// =============================================================================

export function getAbilitySpecials(
  depot: SkillDepot,
  abilityName: AbilityName,
): Resolution<Map<SpecialName, number>> {
  const specials = depot.abilitySpecials.get(abilityName);
  if (!specials) {
    return failed(
      new EngineError('UnknownAbility', `Ability "${abilityName}" is not in the depot`, {
        abilityName,
      }),
    );
  }
  return resolved(specials);
}

/**
 * Read one special, failing with UnknownAbility or UnknownSpecial.
 */
export function getSpecial(
  depot: SkillDepot,
  abilityName: AbilityName,
  specialName: SpecialName,
): Resolution<number> {
  const specials = getAbilitySpecials(depot, abilityName);
  if (!specials.ok) return specials;

  const value = specials.value.get(specialName);
  if (value === undefined) {
    return failed(
      new EngineError(
        'UnknownSpecial',
        `Special "${specialName}" is not defined for ability "${abilityName}"`,
        { abilityName, specialName },
      ),
    );
  }
  return resolved(value);
}

export function getSkill(depot: SkillDepot, skillId: number): Resolution<SkillState> {
  const skill = depot.skills.get(skillId);
  if (!skill) {
    return failed(
      new EngineError('UnknownSkill', `Skill ${skillId} is not in the depot`, { skillId }),
    );
  }
  return resolved(skill);
}

export function getExtraLevel(depot: SkillDepot, talentType: TalentType): number {
  return depot.extraLevels.get(talentType) ?? 0;
}

export function hasTalentParam(
  depot: SkillDepot,
  abilityName: AbilityName,
  talentParam: string,
): boolean {
  return depot.talentParams.get(abilityName)?.has(talentParam) ?? false;
}

// =============================================================================
// Snapshots
// =============================================================================

export function toDepotSnapshot(depot: SkillDepot): SkillDepotSnapshot {
  const abilitySpecials: Record<AbilityName, Record<SpecialName, number>> = {};
  for (const [ability, specials] of depot.abilitySpecials) {
    abilitySpecials[ability] = Object.fromEntries(specials);
  }

  const skills: Record<string, SkillState> = {};
  for (const [skillId, skill] of depot.skills) {
    skills[String(skillId)] = { ...skill };
  }

  const talentParams: Record<AbilityName, string[]> = {};
  for (const [ability, params] of depot.talentParams) {
    talentParams[ability] = [...params].sort();
  }

  const extraLevels: Partial<Record<TalentType, number>> = {};
  for (const [talentType, level] of depot.extraLevels) {
    extraLevels[talentType] = level;
  }

  return { abilitySpecials, skills, talentParams, extraLevels };
}

export function fromDepotSnapshot(snapshot: SkillDepotSnapshot): SkillDepot {
  const depot = createEmptyDepot();
  for (const [ability, specials] of Object.entries(snapshot.abilitySpecials)) {
    depot.abilitySpecials.set(
      ability,
      new Map(Object.entries(specials).map(([name, value]) => [name, Math.fround(value)] as const)),
    );
  }
  for (const [skillId, skill] of Object.entries(snapshot.skills)) {
    depot.skills.set(Number(skillId), {
      cdTime: Math.fround(skill.cdTime),
      maxChargeNum: skill.maxChargeNum,
    });
  }
  for (const [ability, params] of Object.entries(snapshot.talentParams)) {
    depot.talentParams.set(ability, new Set(params));
  }
  for (const talentType of TALENT_TYPES) {
    const level = snapshot.extraLevels[talentType];
    if (level !== undefined) depot.extraLevels.set(talentType, level);
  }
  return depot;
}
