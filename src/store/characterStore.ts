/**
 * Character state management using Zustand.
 *
 * Holds compiled avatar templates and the live characters spawned from
 * them. Each live character owns its depot; the store is the single
 * writer for every depot it holds.
 *
 * Flow:
 * 1. registerAvatar() compiles each avatar definition once
 * 2. buildHashIndex() indexes every registered ability configuration
 * 3. spawnCharacter() / loadCharacter() produce live characters
 * 4. unlockTalent() and overrideSpecial() mutate a live depot
 * 5. saveCharacter() hands a snapshot to the storage adapter
 */

import { createStore } from 'zustand/vanilla';
import type { AvatarId, CharacterGuid, SkillDepot } from '../engine/types';
import {
  AbilityHashIndex,
  applyTalent,
  compileAvatar,
  findTalent,
  fromDepotSnapshot,
  getSpecial,
  instantiateDepot,
  overrideSpecialByHash,
  toDepotSnapshot,
  type ApplyResult,
  type AvatarDefinition,
  type CompiledAvatar,
  type PredicateContext,
  type TalentApplication,
} from '../engine/ability';
import type { DepotStorageAdapter } from '../storage/types';
import defaultLogger, { type Logger } from '../logger';

// =============================================================================
// Types
// =============================================================================

export interface LiveCharacter {
  readonly guid: CharacterGuid;
  readonly avatarId: AvatarId;
  readonly depot: SkillDepot;
  readonly unlockedTalentIds: readonly number[];
}

export interface CharacterStoreState {
  avatars: ReadonlyMap<AvatarId, CompiledAvatar>;
  characters: ReadonlyMap<CharacterGuid, LiveCharacter>;
  hashIndex: AbilityHashIndex | null;

  /** Compile an avatar definition, replacing any earlier one with the same id */
  registerAvatar: (definition: AvatarDefinition) => CompiledAvatar;
  /** Index the names of every registered avatar's abilities */
  buildHashIndex: () => AbilityHashIndex;
  /** Create a live character from a registered avatar's template */
  spawnCharacter: (guid: CharacterGuid, avatarId: AvatarId) => LiveCharacter;
  /** Apply one of the avatar's talents to a live character */
  unlockTalent: (guid: CharacterGuid, talentId: number, context?: PredicateContext) => TalentApplication;
  /** Overwrite a special addressed by hashed identifiers */
  overrideSpecial: (
    guid: CharacterGuid,
    abilityNameHash: number,
    specialNameHash: number,
    value: number,
  ) => ApplyResult;
  /** Read a special, or undefined when the ability or special is missing */
  getSpecial: (guid: CharacterGuid, abilityName: string, specialName: string) => number | undefined;
  saveCharacter: (guid: CharacterGuid) => Promise<void>;
  /** Restore a character from storage; null when nothing is stored */
  loadCharacter: (guid: CharacterGuid) => Promise<LiveCharacter | null>;
  releaseCharacter: (guid: CharacterGuid) => void;
}

export interface CharacterStoreOptions {
  readonly storage: DepotStorageAdapter;
  readonly logger?: Logger;
}

// =============================================================================
// Store
// =============================================================================

export function createCharacterStore(options: CharacterStoreOptions) {
  const { storage } = options;
  const logger = options.logger ?? defaultLogger;

  return createStore<CharacterStoreState>()((set, get) => {
    function requireAvatar(avatarId: AvatarId): CompiledAvatar {
      const avatar = get().avatars.get(avatarId);
      if (!avatar) {
        throw new Error(`Avatar ${avatarId} is not registered`);
      }
      return avatar;
    }

    function requireCharacter(guid: CharacterGuid): LiveCharacter {
      const character = get().characters.get(guid);
      if (!character) {
        throw new Error(`Character ${guid} is not loaded`);
      }
      return character;
    }

    function putCharacter(character: LiveCharacter): void {
      const characters = new Map(get().characters);
      characters.set(character.guid, character);
      set({ characters });
    }

    return {
      avatars: new Map(),
      characters: new Map(),
      hashIndex: null,

      registerAvatar: (definition) => {
        const compiled = compileAvatar(definition, logger);
        const avatars = new Map(get().avatars);
        avatars.set(compiled.avatarId, compiled);
        set({ avatars });
        return compiled;
      },

      buildHashIndex: () => {
        const configs = [...get().avatars.values()].flatMap(a => a.definition.abilities);
        const hashIndex = AbilityHashIndex.build(configs, { logger });
        set({ hashIndex });
        return hashIndex;
      },

      spawnCharacter: (guid, avatarId) => {
        if (get().characters.has(guid)) {
          throw new Error(`Character ${guid} already exists`);
        }
        const character: LiveCharacter = {
          guid,
          avatarId,
          depot: instantiateDepot(requireAvatar(avatarId)),
          unlockedTalentIds: [],
        };
        putCharacter(character);
        return character;
      },

      unlockTalent: (guid, talentId, context) => {
        const character = requireCharacter(guid);
        const avatar = requireAvatar(character.avatarId);

        const talent = findTalent(avatar, talentId);
        if (!talent) {
          throw new Error(`Avatar ${avatar.avatarId} has no talent ${talentId}`);
        }
        if (talent.unlockedByDefault || character.unlockedTalentIds.includes(talentId)) {
          throw new Error(`Talent ${talentId} is already unlocked for ${guid}`);
        }

        const application = applyTalent(character.depot, talent, {
          abilities: avatar.abilities,
          context,
          logger,
        });

        putCharacter({
          ...character,
          unlockedTalentIds: [...character.unlockedTalentIds, talentId],
        });
        return application;
      },

      overrideSpecial: (guid, abilityNameHash, specialNameHash, value) => {
        const { hashIndex } = get();
        if (!hashIndex) {
          throw new Error('Hash index has not been built');
        }
        const character = requireCharacter(guid);
        const result = overrideSpecialByHash(
          character.depot,
          hashIndex,
          abilityNameHash,
          specialNameHash,
          value,
        );
        if (result.status === 'FAILED') {
          logger.warn('special_override_failed', {
            guid,
            kind: result.error.kind,
            message: result.error.message,
          });
        } else {
          putCharacter({ ...character });
        }
        return result;
      },

      getSpecial: (guid, abilityName, specialName) => {
        const special = getSpecial(requireCharacter(guid).depot, abilityName, specialName);
        return special.ok ? special.value : undefined;
      },

      saveCharacter: async (guid) => {
        const character = requireCharacter(guid);
        await storage.saveRecord({
          guid,
          avatarId: character.avatarId,
          unlockedTalentIds: [...character.unlockedTalentIds],
          depot: toDepotSnapshot(character.depot),
          updatedAt: new Date().toISOString(),
        });
      },

      loadCharacter: async (guid) => {
        const record = await storage.getRecord(guid);
        if (!record) return null;

        requireAvatar(record.avatarId);
        const character: LiveCharacter = {
          guid: record.guid,
          avatarId: record.avatarId,
          depot: fromDepotSnapshot(record.depot),
          unlockedTalentIds: [...record.unlockedTalentIds],
        };
        putCharacter(character);
        return character;
      },

      releaseCharacter: (guid) => {
        const characters = new Map(get().characters);
        characters.delete(guid);
        set({ characters });
      },
    };
  });
}

export type CharacterStore = ReturnType<typeof createCharacterStore>;
