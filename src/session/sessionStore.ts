import { Mutex } from 'async-mutex';
import { randomUUID } from 'crypto';
import { mkdir, mkdtemp, readFile, rm, unlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describeDataset } from '../data/describe';
import { decodeSnapshot, encodeSnapshot } from '../data/snapshot';
import type { Dataset, SessionRecord } from '../types';
import { NotFoundError, errorMessage, fromFsError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionStore');

export interface SessionStoreOptions {
  now?: () => number;
}

/**
 * Registry of dataset sessions. Every operation on the registry runs under
 * one mutex, so a snapshot file exists exactly while its record does.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly mutex = new Mutex();
  private readonly now: () => number;

  constructor(
    readonly directory: string,
    options: SessionStoreOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a store backed by a fresh process-scoped directory.
   */
  static async open(rootDir: string = tmpdir(), options: SessionStoreOptions = {}): Promise<SessionStore> {
    await mkdir(rootDir, { recursive: true });
    const directory = await mkdtemp(join(rootDir, 'hypoforge-'));
    logger.info(`Session storage at ${directory}`);
    return new SessionStore(directory, options);
  }

  get size(): number {
    return this.sessions.size;
  }

  async create(dataset: Dataset, source: string): Promise<SessionRecord> {
    const bytes = encodeSnapshot(dataset);
    const description = describeDataset(dataset);

    return this.mutex.runExclusive(async () => {
      const sessionId = randomUUID();
      const snapshotPath = join(this.directory, `${sessionId}.arrow`);
      try {
        await writeFile(snapshotPath, bytes, { flag: 'wx' });
      } catch (error) {
        throw fromFsError(error, snapshotPath);
      }

      const record: SessionRecord = {
        sessionId,
        snapshotPath,
        description,
        rowCount: dataset.rowCount,
        columnCount: dataset.columns.length,
        source,
        createdAt: this.now(),
      };
      this.sessions.set(sessionId, record);
      logger.info(`Created session ${sessionId} from ${source}`);
      return record;
    });
  }

  async get(sessionId: string): Promise<SessionRecord> {
    return this.mutex.runExclusive(() => this.require(sessionId));
  }

  async load(sessionId: string): Promise<Dataset> {
    const bytes = await this.mutex.runExclusive(async () => {
      const record = this.require(sessionId);
      try {
        return await readFile(record.snapshotPath);
      } catch (error) {
        const mapped = fromFsError(error, record.snapshotPath);
        if (mapped instanceof NotFoundError) {
          throw new NotFoundError(`Session data not found: ${sessionId}`);
        }
        throw mapped;
      }
    });
    return decodeSnapshot(bytes);
  }

  async delete(sessionId: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const record = this.require(sessionId);
      await this.remove(record);
    });
  }

  /**
   * Remove every session at least `maxAgeMs` old. A failing entry is logged
   * and left in place; it does not stop the sweep and is not counted.
   */
  async sweep(maxAgeMs: number): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const now = this.now();
      let removed = 0;
      for (const record of Array.from(this.sessions.values())) {
        if (now - record.createdAt < maxAgeMs) {
          continue;
        }
        try {
          await this.remove(record);
          removed += 1;
        } catch (error) {
          logger.warn(`Skipping session ${record.sessionId} during cleanup: ${errorMessage(error)}`);
        }
      }
      if (removed > 0) {
        logger.info(`Cleaned up ${removed} old sessions`);
      }
      return removed;
    });
  }

  /**
   * Remove every session and the storage directory itself.
   */
  async dispose(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.sessions.clear();
      await rm(this.directory, { recursive: true, force: true });
    });
  }

  private require(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return record;
  }

  // Callers hold the mutex.
  private async remove(record: SessionRecord): Promise<void> {
    try {
      await unlink(record.snapshotPath);
    } catch (error) {
      const mapped = fromFsError(error, record.snapshotPath);
      if (!(mapped instanceof NotFoundError)) {
        throw mapped;
      }
    }
    this.sessions.delete(record.sessionId);
    logger.info(`Deleted session ${record.sessionId}`);
  }
}
