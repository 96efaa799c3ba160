/**
 * Core type definitions for the talent special engine.
 */

// =============================================================================
// ID Types
// =============================================================================

/** Name of an ability configuration (e.g. "Avatar_Test_ElementalArt") */
export type AbilityName = string;

/** Name of a numeric special inside an ability's specials table */
export type SpecialName = string;

/** Identifier of an avatar definition */
export type AvatarId = number;

/** Identifier of a skill within an avatar's depot */
export type SkillId = number;

/** Unique identifier of a live character instance */
export type CharacterGuid = string;

/** Unsigned 32-bit hash of an identifier string */
export type NameHash = number;

/** Ordered parameter list attached to a talent or proud skill level */
export type ParamList = readonly number[];

// =============================================================================
// Enums
// =============================================================================

export const TALENT_TYPES = [
  'NormalAttack',
  'ElementalSkill',
  'ElementalBurst',
] as const;

export type TalentType = (typeof TALENT_TYPES)[number];

export const ABILITY_STATES = [
  'ElementFreeze',
  'ElementWet',
  'MuteTaunt',
] as const;

export type AbilityState = (typeof ABILITY_STATES)[number];

// =============================================================================
// Ability Configuration
// =============================================================================

/**
 * Loaded ability configuration, as supplied by the data loader.
 * Only the fields the engine reads are modelled.
 */
export interface AbilityConfig {
  readonly abilityName: AbilityName;
  /** Default values for every special the ability declares */
  readonly abilitySpecials?: Readonly<Record<SpecialName, number>>;
  /** Modifier configurations keyed by modifier name; bodies are opaque here */
  readonly modifiers?: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Skill Depot
// =============================================================================

export interface SkillState {
  cdTime: number;
  maxChargeNum: number;
}

export interface SkillDefinition {
  readonly skillId: SkillId;
  readonly cdTime: number;
  readonly maxChargeNum: number;
}

/**
 * Mutable per-character store of ability specials.
 * Owned by exactly one character; never shared between characters.
 */
export interface SkillDepot {
  readonly abilitySpecials: Map<AbilityName, Map<SpecialName, number>>;
  readonly skills: Map<SkillId, SkillState>;
  readonly talentParams: Map<AbilityName, Set<string>>;
  readonly extraLevels: Map<TalentType, number>;
}

/** JSON-compatible form of a skill depot, used by persistence */
export interface SkillDepotSnapshot {
  readonly abilitySpecials: Record<AbilityName, Record<SpecialName, number>>;
  readonly skills: Record<string, SkillState>;
  readonly talentParams: Record<AbilityName, string[]>;
  readonly extraLevels: Partial<Record<TalentType, number>>;
}
