/**
 * Validation of raw configuration records.
 *
 * The data loader hands over already-deserialized JSON. These schemas
 * turn it into the engine's tagged unions and reject anything else with
 * one "$.path: message" line per problem.
 */

import { z } from 'zod';
import { ABILITY_STATES, TALENT_TYPES } from '../types';
import type { AbilityConfig } from '../types';
import { LOGIC_TYPES } from './types';
import type { AvatarDefinition, Predicate, TalentDefinition, TalentModifier } from './types';

// =============================================================================
// Shared Pieces
// =============================================================================

export const ParamReferenceSchema = z.union([z.number(), z.string()]).optional();

export const LogicTypeSchema = z.enum(LOGIC_TYPES);

const PredicateTargetSchema = z.enum(['Self', 'Target']).optional();

// =============================================================================
// Predicates
// =============================================================================

export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('ByTargetAltitude'),
      target: PredicateTargetSchema,
      logic: LogicTypeSchema.optional(),
      value: z.number(),
    }),
    z.object({
      kind: z.literal('ByTargetHPRatio'),
      target: PredicateTargetSchema,
      logic: LogicTypeSchema.optional(),
      value: z.number(),
    }),
    z.object({
      kind: z.literal('ByHasAbilityState'),
      target: PredicateTargetSchema,
      abilityState: z.enum(ABILITY_STATES),
    }),
    z.object({
      kind: z.literal('ByAny'),
      predicates: z.array(PredicateSchema),
    }),
    z.object({
      kind: z.literal('ByNot'),
      predicates: z.array(PredicateSchema),
    }),
  ]),
);

// =============================================================================
// Talent Modifiers
// =============================================================================

const predicates = z.array(PredicateSchema).optional();

export const TalentModifierSchema: z.ZodType<TalentModifier> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('ModifyAbility'),
    abilityName: z.string().min(1),
    paramSpecial: z.string().min(1),
    paramDelta: ParamReferenceSchema,
    paramRatio: ParamReferenceSchema,
    predicates,
  }),
  z.object({
    kind: z.literal('AddAbility'),
    abilityName: z.string().min(1),
    predicates,
  }),
  z.object({
    kind: z.literal('UnlockTalentParam'),
    abilityName: z.string().min(1),
    talentParam: z.string().min(1),
    predicates,
  }),
  z.object({
    kind: z.literal('AddTalentExtraLevel'),
    talentType: z.enum(TALENT_TYPES),
    extraLevel: z.number().int(),
    predicates,
  }),
  z.object({
    kind: z.literal('ModifySkillCD'),
    skillId: z.number().int(),
    cdDelta: ParamReferenceSchema,
    cdRatio: ParamReferenceSchema,
    predicates,
  }),
  z.object({
    kind: z.literal('ModifySkillPoint'),
    skillId: z.number().int(),
    pointDelta: z.number().int(),
    predicates,
  }),
]);

// =============================================================================
// Abilities, Talents and Avatars
// =============================================================================

export const AbilityConfigSchema: z.ZodType<AbilityConfig> = z.object({
  abilityName: z.string().min(1),
  abilitySpecials: z.record(z.number()).optional(),
  modifiers: z.record(z.unknown()).optional(),
});

export const TalentDefinitionSchema: z.ZodType<TalentDefinition> = z.object({
  talentId: z.number().int(),
  source: z.enum(['TALENT', 'PROUD_SKILL']),
  paramList: z.array(z.number()),
  modifiers: z.array(TalentModifierSchema),
  unlockedByDefault: z.boolean().optional(),
});

export const AvatarDefinitionSchema: z.ZodType<AvatarDefinition> = z.object({
  avatarId: z.number().int(),
  abilities: z.array(AbilityConfigSchema),
  skills: z.array(
    z.object({
      skillId: z.number().int(),
      cdTime: z.number().min(0),
      maxChargeNum: z.number().int().min(0),
    }),
  ),
  talents: z.array(TalentDefinitionSchema),
});

// =============================================================================
// Parsing
// =============================================================================

export class ConfigParseError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigParseError';
  }
}

export function formatZodIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const jsonPath = issue.path.length
      ? `$.${issue.path
          .map((part) => (typeof part === 'number' ? `[${part}]` : String(part)))
          .join('.')
          .replace(/\.\[/g, '[')}`
      : '$';
    return `${jsonPath}: ${issue.message}`;
  });
}

function parseWith<T>(schema: z.ZodType<T>, raw: unknown, what: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigParseError(`Invalid ${what}`, formatZodIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function parsePredicate(raw: unknown): Predicate {
  return parseWith(PredicateSchema, raw, 'predicate');
}

export function parseTalentModifier(raw: unknown): TalentModifier {
  return parseWith(TalentModifierSchema, raw, 'talent modifier');
}

export function parseAbilityConfig(raw: unknown): AbilityConfig {
  return parseWith(AbilityConfigSchema, raw, 'ability config');
}

export function parseAvatarDefinition(raw: unknown): AvatarDefinition {
  return parseWith(AvatarDefinitionSchema, raw, 'avatar definition');
}
