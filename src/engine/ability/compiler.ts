/**
 * Compiles avatar definitions into template depots.
 *
 * A template is compiled once per avatar definition. Live characters
 * receive independent clones of it, so compiling many avatars or
 * spawning many characters shares no mutable state.
 */

import type { AbilityConfig, AbilityName, AvatarId, SkillDepot } from '../types';
import defaultLogger, { type Logger } from '../../logger';
import { cloneSkillDepot, createSkillDepot } from './depot';
import { applyTalent } from './talents';
import type { AvatarDefinition, TalentApplication, TalentDefinition } from './types';

export interface CompiledAvatar {
  readonly avatarId: AvatarId;
  readonly definition: AvatarDefinition;
  /** Ability configurations by name, for granting abilities later */
  readonly abilities: ReadonlyMap<AbilityName, AbilityConfig>;
  /** Template depot; never handed out directly */
  readonly template: SkillDepot;
  /** Results of the talents applied at compile time */
  readonly defaultTalents: readonly TalentApplication[];
}

export function indexAbilities(abilities: readonly AbilityConfig[]): Map<AbilityName, AbilityConfig> {
  return new Map(abilities.map(a => [a.abilityName, a] as const));
}

/**
 * Build the template depot of an avatar and apply its default talents
 * in declared order.
 */
export function compileAvatar(
  definition: AvatarDefinition,
  logger: Logger = defaultLogger,
): CompiledAvatar {
  const abilities = indexAbilities(definition.abilities);
  const template = createSkillDepot(definition.abilities, definition.skills);

  const defaultTalents = definition.talents
    .filter(t => t.unlockedByDefault)
    .map(talent => applyTalent(template, talent, { abilities, logger }));

  logger.debug('avatar_compiled', {
    avatarId: definition.avatarId,
    abilities: abilities.size,
    defaultTalents: defaultTalents.length,
  });

  return {
    avatarId: definition.avatarId,
    definition,
    abilities,
    template,
    defaultTalents,
  };
}

/**
 * Create an independent depot for a live character.
 */
export function instantiateDepot(avatar: CompiledAvatar): SkillDepot {
  return cloneSkillDepot(avatar.template);
}

export function findTalent(avatar: CompiledAvatar, talentId: number): TalentDefinition | undefined {
  return avatar.definition.talents.find(t => t.talentId === talentId);
}
