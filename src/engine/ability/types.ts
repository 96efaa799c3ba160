/**
 * Type definitions for talent modifiers and predicates.
 *
 * Both families are closed tagged unions on `kind`, so every consumer
 * matches them exhaustively and each variant's field shape is explicit.
 */

import type {
  AbilityConfig,
  AbilityName,
  AbilityState,
  AvatarId,
  ParamList,
  SkillDefinition,
  SkillId,
  SpecialName,
  TalentType,
} from '../types';
import type { EngineError } from '../errors';

// =============================================================================
// Parameter References
// =============================================================================

/**
 * A configured numeric value: absent, a literal, or an indexed reference
 * such as "%2" pointing into the contextual parameter list.
 */
export type ParamReference = number | string | undefined;

// =============================================================================
// Logic Operators
// =============================================================================

export const LOGIC_TYPES = [
  'Equal',
  'NotEqual',
  'Greater',
  'GreaterOrEqual',
  'Less',
  'LessOrEqual',
] as const;

export type LogicType = (typeof LOGIC_TYPES)[number];

// =============================================================================
// Predicates - Boolean gates over world/character state
// =============================================================================

/** Which entity of the evaluation context a predicate inspects */
export type PredicateTarget = 'Self' | 'Target';

export interface ByTargetAltitude {
  readonly kind: 'ByTargetAltitude';
  readonly target?: PredicateTarget;
  readonly logic?: LogicType;
  readonly value: number;
}

export interface ByTargetHPRatio {
  readonly kind: 'ByTargetHPRatio';
  readonly target?: PredicateTarget;
  readonly logic?: LogicType;
  readonly value: number;
}

export interface ByHasAbilityState {
  readonly kind: 'ByHasAbilityState';
  readonly target?: PredicateTarget;
  readonly abilityState: AbilityState;
}

export interface ByAny {
  readonly kind: 'ByAny';
  readonly predicates: readonly Predicate[];
}

export interface ByNot {
  readonly kind: 'ByNot';
  readonly predicates: readonly Predicate[];
}

export type Predicate =
  | ByTargetAltitude
  | ByTargetHPRatio
  | ByHasAbilityState
  | ByAny
  | ByNot;

export type PredicateKind = Predicate['kind'];

/** Already-resolved state of one entity, supplied by the caller */
export interface EntityState {
  readonly altitude: number;
  readonly hpRatio: number;
  readonly abilityStates: ReadonlySet<AbilityState>;
}

export interface PredicateContext {
  readonly self: EntityState;
  readonly target?: EntityState;
}

// =============================================================================
// Talent Modifiers - Mutations of a skill depot
// =============================================================================

interface GatedModifier {
  /** All must hold for the modifier to apply */
  readonly predicates?: readonly Predicate[];
}

export interface ModifyAbility extends GatedModifier {
  readonly kind: 'ModifyAbility';
  readonly abilityName: AbilityName;
  readonly paramSpecial: SpecialName;
  readonly paramDelta?: number | string;
  readonly paramRatio?: number | string;
}

export interface AddAbility extends GatedModifier {
  readonly kind: 'AddAbility';
  readonly abilityName: AbilityName;
}

export interface UnlockTalentParam extends GatedModifier {
  readonly kind: 'UnlockTalentParam';
  readonly abilityName: AbilityName;
  readonly talentParam: string;
}

export interface AddTalentExtraLevel extends GatedModifier {
  readonly kind: 'AddTalentExtraLevel';
  readonly talentType: TalentType;
  readonly extraLevel: number;
}

export interface ModifySkillCD extends GatedModifier {
  readonly kind: 'ModifySkillCD';
  readonly skillId: SkillId;
  readonly cdDelta?: number | string;
  readonly cdRatio?: number | string;
}

export interface ModifySkillPoint extends GatedModifier {
  readonly kind: 'ModifySkillPoint';
  readonly skillId: SkillId;
  readonly pointDelta: number;
}

export type TalentModifier =
  | ModifyAbility
  | AddAbility
  | UnlockTalentParam
  | AddTalentExtraLevel
  | ModifySkillCD
  | ModifySkillPoint;

export type TalentModifierKind = TalentModifier['kind'];

// =============================================================================
// Application
// =============================================================================

export interface ApplyOptions {
  /** World/character state used to evaluate modifier predicates */
  readonly context?: PredicateContext;
  /** Ability configurations used to seed specials of granted abilities */
  readonly abilities?: ReadonlyMap<AbilityName, AbilityConfig>;
}

/**
 * Result of applying one modifier.
 * FAILED never mutates the depot.
 */
export type ApplyResult =
  | { readonly status: 'APPLIED' }
  | { readonly status: 'GATED' }
  | { readonly status: 'FAILED'; readonly error: EngineError };

export interface ModifierOutcome {
  readonly index: number;
  readonly modifier: TalentModifier;
  readonly result: ApplyResult;
}

// =============================================================================
// Talents and Proud Skills
// =============================================================================

export type TalentSource = 'TALENT' | 'PROUD_SKILL';

/**
 * A talent or proud-skill level: one param list and the modifiers that
 * read it, in declared order.
 */
export interface TalentDefinition {
  readonly talentId: number;
  readonly source: TalentSource;
  readonly paramList: ParamList;
  readonly modifiers: readonly TalentModifier[];
  /** Applied when the avatar template is compiled */
  readonly unlockedByDefault?: boolean;
}

export interface TalentApplication {
  readonly talentId: number;
  readonly outcomes: readonly ModifierOutcome[];
  readonly appliedCount: number;
  readonly failedCount: number;
}

// =============================================================================
// Avatar Definitions
// =============================================================================

/**
 * Everything needed to compile an avatar's template depot.
 */
export interface AvatarDefinition {
  readonly avatarId: AvatarId;
  readonly abilities: readonly AbilityConfig[];
  readonly skills: readonly SkillDefinition[];
  /** Talents and proud-skill levels, in declared order */
  readonly talents: readonly TalentDefinition[];
}
