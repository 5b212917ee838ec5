import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StatePersistenceError } from '../errors/index.js';
import { createModuleLogger } from '../utils/logger.js';
import type { CampaignState, CampaignStateTable } from '../types/campaign.js';

const log = createModuleLogger('campaignStateStore');

export interface CampaignStateStore {
  load(): Promise<CampaignStateTable>;
  save(table: CampaignStateTable): Promise<void>;
}

const STATE_FILE_VERSION = 1;

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const campaignStateSchema = z.object({
  started_at: isoDate.nullable(),
  stage: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]),
  next_due: isoDate.nullable(),
  halted: z.boolean(),
});

const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  lastUpdated: z.string(),
  contacts: z.record(campaignStateSchema),
});

interface SerializedCampaignState {
  started_at: string | null;
  stage: number;
  next_due: string | null;
  halted: boolean;
}

function serializeState(state: CampaignState): SerializedCampaignState {
  return {
    started_at: state.started_at ? state.started_at.toISOString() : null,
    stage: state.stage,
    next_due: state.next_due ? state.next_due.toISOString() : null,
    halted: state.halted,
  };
}

/**
 * JSON-file state store. Every save writes `<file>.tmp` and renames it over
 * the state file, so a crash mid-save leaves the previous file in place.
 */
export class JsonFileStateStore implements CampaignStateStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<CampaignStateTable> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        log.info({ filePath: this.filePath }, 'No state file yet, starting with empty state');
        return new Map();
      }
      throw new StatePersistenceError(`Could not read state file ${this.filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StatePersistenceError(`State file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const result = stateFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new StatePersistenceError(`State file ${this.filePath} is malformed (${where})`);
    }

    const table: CampaignStateTable = new Map();
    for (const [key, state] of Object.entries(result.data.contacts)) {
      table.set(key, state);
    }
    log.debug({ filePath: this.filePath, contacts: table.size }, 'State loaded');
    return table;
  }

  async save(table: CampaignStateTable): Promise<void> {
    const contacts: Record<string, SerializedCampaignState> = {};
    for (const key of [...table.keys()].sort()) {
      const state = table.get(key);
      if (state) {
        contacts[key] = serializeState(state);
      }
    }

    const data = {
      version: STATE_FILE_VERSION,
      lastUpdated: new Date().toISOString(),
      contacts,
    };

    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      log.error({ filePath: this.filePath, error }, 'Failed to persist campaign state');
      throw new StatePersistenceError(`Could not write state file ${this.filePath}`, { cause: error });
    }
  }
}

/**
 * Wraps a store so that reads go through and writes are dropped. Used for
 * simulated runs configured not to commit state.
 */
export class ReadOnlyStateStore implements CampaignStateStore {
  private inner: CampaignStateStore;

  constructor(inner: CampaignStateStore) {
    this.inner = inner;
  }

  load(): Promise<CampaignStateTable> {
    return this.inner.load();
  }

  async save(table: CampaignStateTable): Promise<void> {
    log.debug({ contacts: table.size }, 'Read-only state store, skipping save');
  }
}
