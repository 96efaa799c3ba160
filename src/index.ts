export * from './engine';
export { createCharacterStore } from './store/characterStore';
export type {
  CharacterStore,
  CharacterStoreOptions,
  CharacterStoreState,
  LiveCharacter,
} from './store/characterStore';
export type { CharacterRecord, DepotStorageAdapter } from './storage/types';
export { MemoryDepotStorage } from './storage/memoryStorage';
export { createFileDepotStorage, FileDepotStorage } from './storage/fileStorage';
export { loadConfig, ConfigError } from './config';
export type { EngineConfig, LogLevel } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';
