/**
 * JSON file storage adapter.
 * Stores one `<guid>.json` file per character under a directory.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CharacterGuid } from '../engine/types';
import { loadConfig, type EngineConfig } from '../config';
import defaultLogger, { type Logger } from '../logger';
import { CharacterRecordSchema, type CharacterRecord, type DepotStorageAdapter } from './types';

const GUID_PATTERN = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileDepotStorage implements DepotStorageAdapter {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  isAvailable(): boolean {
    return this.directory.length > 0;
  }

  private fileFor(guid: CharacterGuid): string {
    if (!GUID_PATTERN.test(guid)) {
      throw new Error(`Invalid character guid "${guid}"`);
    }
    return path.join(this.directory, `${guid}.json`);
  }

  async getRecord(guid: CharacterGuid): Promise<CharacterRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(guid), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('depot_record_invalid', {
        guid,
        issues: [error instanceof Error ? error.message : String(error)],
      });
      return null;
    }

    const parsed = CharacterRecordSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('depot_record_invalid', {
        guid,
        issues: parsed.error.issues.map(issue => issue.message),
      });
      return null;
    }
    return parsed.data;
  }

  async saveRecord(record: CharacterRecord): Promise<void> {
    const file = this.fileFor(record.guid);
    await mkdir(this.directory, { recursive: true });
    await writeFile(file, JSON.stringify(record, null, 2), 'utf8');
  }

  async deleteRecord(guid: CharacterGuid): Promise<void> {
    await rm(this.fileFor(guid), { force: true });
  }
}

/**
 * File storage rooted at the configured depot directory.
 */
export function createFileDepotStorage(
  config: Pick<EngineConfig, 'depotStorageDir'> = loadConfig(),
  logger: Logger = defaultLogger,
): FileDepotStorage {
  return new FileDepotStorage(config.depotStorageDir, logger);
}
