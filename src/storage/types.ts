/**
 * Storage types and interfaces.
 *
 * The engine does not own persistence. These adapters are the seam the
 * persistence layer plugs into: it receives character snapshots to store
 * and hands them back on load.
 */

import { z } from 'zod';
import type { AvatarId, CharacterGuid, SkillDepotSnapshot } from '../engine/types';

// =============================================================================
// Character Records
// =============================================================================

export interface CharacterRecord {
  readonly guid: CharacterGuid;
  readonly avatarId: AvatarId;
  /** Talents unlocked after spawning, in unlock order */
  readonly unlockedTalentIds: readonly number[];
  readonly depot: SkillDepotSnapshot;
  readonly updatedAt: string;
}

const SkillStateSchema = z.object({
  cdTime: z.number(),
  maxChargeNum: z.number().int(),
});

export const SkillDepotSnapshotSchema = z.object({
  abilitySpecials: z.record(z.record(z.number())),
  skills: z.record(SkillStateSchema),
  talentParams: z.record(z.array(z.string())),
  extraLevels: z.object({
    NormalAttack: z.number().int().optional(),
    ElementalSkill: z.number().int().optional(),
    ElementalBurst: z.number().int().optional(),
  }),
});

export const CharacterRecordSchema = z.object({
  guid: z.string().min(1),
  avatarId: z.number().int(),
  unlockedTalentIds: z.array(z.number().int()),
  depot: SkillDepotSnapshotSchema,
  updatedAt: z.string(),
});

// =============================================================================
// Storage Adapter Interface
// =============================================================================

export interface DepotStorageAdapter {
  /**
   * Get a character record by guid.
   * Returns null if no record exists.
   */
  getRecord(guid: CharacterGuid): Promise<CharacterRecord | null>;

  /**
   * Save a complete character record, replacing any previous one.
   */
  saveRecord(record: CharacterRecord): Promise<void>;

  /**
   * Delete a character record. Deleting a missing record is not an error.
   */
  deleteRecord(guid: CharacterGuid): Promise<void>;

  /**
   * Check if storage is available.
   */
  isAvailable(): boolean;
}
