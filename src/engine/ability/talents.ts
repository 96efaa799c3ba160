/**
 * Talent modifier application.
 *
 * Each modifier kind mutates a skill depot in place. All lookups and
 * parameter references are resolved before the first write, so a
 * FAILED result always leaves the depot as it was.
 *
 * Modifiers targeting the same value are applied in the order the
 * caller supplies; the engine never reorders them.
 */

import type { ParamList, SkillDepot } from '../types';
import { resolved, type Resolution } from '../errors';
import defaultLogger, { type Logger } from '../../logger';
import { getAbilitySpecials, getSkill, getSpecial, specialsFromConfig } from './depot';
import { evaluateAllPredicates } from './predicates';
import { isIndexedReference, resolveParamReference } from './references';
import type {
  ApplyOptions,
  ApplyResult,
  ModifierOutcome,
  ParamReference,
  TalentApplication,
  TalentDefinition,
  TalentModifier,
  TalentModifierKind,
} from './types';

const APPLIED: ApplyResult = { status: 'APPLIED' };
const GATED: ApplyResult = { status: 'GATED' };

// =============================================================================
// Delta / Ratio Step
// =============================================================================

/**
 * Add the delta, then multiply by the ratio.
 *
 * A literal ratio of 0 is skipped; a referenced ratio that resolves to 0
 * is applied and zeroes the value. A literal delta of 0 is added as usual.
 */
export function applyDeltaThenRatio(
  current: number,
  delta: ParamReference,
  ratio: ParamReference,
  paramList: ParamList,
): Resolution<number> {
  const resolvedDelta = resolveParamReference(delta, paramList);
  if (!resolvedDelta.ok) return resolvedDelta;

  const resolvedRatio = resolveParamReference(ratio, paramList);
  if (!resolvedRatio.ok) return resolvedRatio;

  let value = current;

  if (resolvedDelta.value !== undefined) {
    value = Math.fround(value + Math.fround(resolvedDelta.value));
  }

  if (resolvedRatio.value !== undefined) {
    const suppressed = !isIndexedReference(ratio) && resolvedRatio.value === 0;
    if (!suppressed) {
      value = Math.fround(value * Math.fround(resolvedRatio.value));
    }
  }

  return resolved(value);
}

// =============================================================================
// Core Modifier Application
// =============================================================================

function applyUngated(
  modifier: TalentModifier,
  depot: SkillDepot,
  paramList: ParamList,
  options: ApplyOptions,
): ApplyResult {
  switch (modifier.kind) {
    case 'ModifyAbility': {
      const current = getSpecial(depot, modifier.abilityName, modifier.paramSpecial);
      if (!current.ok) return { status: 'FAILED', error: current.error };

      const next = applyDeltaThenRatio(current.value, modifier.paramDelta, modifier.paramRatio, paramList);
      if (!next.ok) return { status: 'FAILED', error: next.error };

      depot.abilitySpecials.get(modifier.abilityName)?.set(modifier.paramSpecial, next.value);
      return APPLIED;
    }

    case 'AddAbility': {
      if (depot.abilitySpecials.has(modifier.abilityName)) return APPLIED;

      const config = options.abilities?.get(modifier.abilityName);
      depot.abilitySpecials.set(
        modifier.abilityName,
        config ? specialsFromConfig(config) : new Map(),
      );
      return APPLIED;
    }

    case 'UnlockTalentParam': {
      const specials = getAbilitySpecials(depot, modifier.abilityName);
      if (!specials.ok) return { status: 'FAILED', error: specials.error };

      const params = depot.talentParams.get(modifier.abilityName) ?? new Set<string>();
      params.add(modifier.talentParam);
      depot.talentParams.set(modifier.abilityName, params);
      return APPLIED;
    }

    case 'AddTalentExtraLevel': {
      const level = depot.extraLevels.get(modifier.talentType) ?? 0;
      depot.extraLevels.set(modifier.talentType, level + modifier.extraLevel);
      return APPLIED;
    }

    case 'ModifySkillCD': {
      const skill = getSkill(depot, modifier.skillId);
      if (!skill.ok) return { status: 'FAILED', error: skill.error };

      const next = applyDeltaThenRatio(skill.value.cdTime, modifier.cdDelta, modifier.cdRatio, paramList);
      if (!next.ok) return { status: 'FAILED', error: next.error };

      skill.value.cdTime = next.value;
      return APPLIED;
    }

    case 'ModifySkillPoint': {
      const skill = getSkill(depot, modifier.skillId);
      if (!skill.ok) return { status: 'FAILED', error: skill.error };

      skill.value.maxChargeNum += modifier.pointDelta;
      return APPLIED;
    }
  }
}

/**
 * Apply one talent modifier to a depot.
 *
 * A modifier carrying predicates is GATED when no context is supplied or
 * when any predicate is false. Errors are returned, never thrown.
 */
export function applyTalentModifier(
  modifier: TalentModifier,
  depot: SkillDepot,
  paramList: ParamList,
  options: ApplyOptions = {},
): ApplyResult {
  if (modifier.predicates && modifier.predicates.length > 0) {
    if (!options.context || !evaluateAllPredicates(modifier.predicates, options.context)) {
      return GATED;
    }
  }
  return applyUngated(modifier, depot, paramList, options);
}

// =============================================================================
// Batch Application
// =============================================================================

export interface BatchOptions extends ApplyOptions {
  readonly logger?: Logger;
}

/**
 * Apply modifiers in sequence. A failed modifier is logged and skipped;
 * its siblings still run.
 */
export function applyTalentModifiers(
  modifiers: readonly TalentModifier[],
  depot: SkillDepot,
  paramList: ParamList,
  options: BatchOptions = {},
): ModifierOutcome[] {
  const logger = options.logger ?? defaultLogger;

  return modifiers.map((modifier, index) => {
    const result = applyTalentModifier(modifier, depot, paramList, options);
    if (result.status === 'FAILED') {
      logger.warn('talent_modifier_failed', {
        index,
        modifier: describeModifier(modifier),
        kind: result.error.kind,
        message: result.error.message,
      });
    }
    return { index, modifier, result };
  });
}

/**
 * Apply a talent or proud-skill level with its own parameter list.
 */
export function applyTalent(
  depot: SkillDepot,
  talent: TalentDefinition,
  options: BatchOptions = {},
): TalentApplication {
  const outcomes = applyTalentModifiers(talent.modifiers, depot, talent.paramList, options);
  return {
    talentId: talent.talentId,
    outcomes,
    appliedCount: outcomes.filter(o => o.result.status === 'APPLIED').length,
    failedCount: outcomes.filter(o => o.result.status === 'FAILED').length,
  };
}

// =============================================================================
// Description Helpers (for logging)
// =============================================================================

const KIND_LABELS: Record<TalentModifierKind, string> = {
  ModifyAbility: 'modify ability',
  AddAbility: 'add ability',
  UnlockTalentParam: 'unlock talent param',
  AddTalentExtraLevel: 'add extra level',
  ModifySkillCD: 'modify skill cd',
  ModifySkillPoint: 'modify skill point',
};

/**
 * Get a short human-readable description of a modifier.
 */
export function describeModifier(modifier: TalentModifier): string {
  const label = KIND_LABELS[modifier.kind];
  switch (modifier.kind) {
    case 'ModifyAbility':
      return `${label} ${modifier.abilityName}.${modifier.paramSpecial}`;
    case 'AddAbility':
      return `${label} ${modifier.abilityName}`;
    case 'UnlockTalentParam':
      return `${label} ${modifier.abilityName}:${modifier.talentParam}`;
    case 'AddTalentExtraLevel':
      return `${label} ${modifier.talentType} +${modifier.extraLevel}`;
    case 'ModifySkillCD':
    case 'ModifySkillPoint':
      return `${label} ${modifier.skillId}`;
  }
}
