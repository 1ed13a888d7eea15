import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { PersistenceFailedError } from '../utils/errors.js';

/**
 * Compares two offsets. Source message ids can exceed Number.MAX_SAFE_INTEGER,
 * so integer offsets are compared as bigints.
 */
export function compareOffsets(a: string, b: string): number {
  const integer = /^-?\d+$/;
  if (integer.test(a) && integer.test(b)) {
    const x = BigInt(a);
    const y = BigInt(b);
    return x === y ? 0 : x < y ? -1 : 1;
  }
  return a === b ? 0 : a < b ? -1 : 1;
}

export interface OffsetReader {
  get(chatId: string): string | undefined;
}

export interface OffsetWriter extends OffsetReader {
  set(chatId: string, offset: string): Promise<void>;
}

/**
 * Last relayed message position per source chat, held in memory and persisted
 * as a single JSON file. Every write replaces the whole file through a temp
 * file and a rename, and writes run one at a time.
 */
export class OffsetStore implements OffsetWriter {
  private readonly logger = createLogger({ component: 'OffsetStore' });
  private offsets = new Map<string, string>();
  private committed = new Map<string, string>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<void> {
    const logger = this.logger.child({ method: 'load', filePath: this.filePath });
    await mkdir(dirname(this.filePath), { recursive: true });

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.info('No offsets file yet; every chat starts with backfill');
        return;
      }
      throw new PersistenceFailedError(`Failed to read offsets file ${this.filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceFailedError(`Offsets file ${this.filePath} is not valid JSON`, { cause: error });
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new PersistenceFailedError(`Offsets file ${this.filePath} must hold a JSON object`);
    }

    const loaded = new Map<string, string>();
    for (const [chatId, value] of Object.entries(parsed)) {
      if (typeof value === 'string' || typeof value === 'number') {
        loaded.set(chatId, String(value));
      } else {
        logger.warn({ chatId, value }, 'Ignoring malformed offset entry');
      }
    }

    this.offsets = loaded;
    this.committed = new Map(loaded);
    logger.info({ chats: loaded.size }, 'Offsets loaded');
  }

  get(chatId: string): string | undefined {
    return this.offsets.get(chatId);
  }

  /**
   * Advances the offset of one chat. Setting the stored value again is a no-op,
   * and a value behind the stored one is ignored.
   */
  async set(chatId: string, offset: string): Promise<void> {
    const current = this.offsets.get(chatId);
    if (current !== undefined) {
      const order = compareOffsets(offset, current);
      if (order === 0) return;
      if (order < 0) {
        this.logger.warn({ chatId, current, offset }, 'Refusing to move offset backward');
        return;
      }
    }

    this.offsets.set(chatId, offset);
    try {
      await this.schedulePersist();
    } catch (error) {
      // Callers must never read an offset that is not on disk
      this.restoreCommitted(chatId);
      throw error;
    }
  }

  /** Forgets a chat's offset so its next pipeline start backfills again. */
  async reset(chatId: string): Promise<void> {
    if (!this.offsets.has(chatId)) return;
    this.offsets.delete(chatId);
    this.logger.info({ chatId }, 'Offset reset');
    try {
      await this.schedulePersist();
    } catch (error) {
      this.restoreCommitted(chatId);
      throw error;
    }
  }

  /** Await the most recently scheduled write, if any. */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private restoreCommitted(chatId: string): void {
    const committed = this.committed.get(chatId);
    if (committed === undefined) {
      this.offsets.delete(chatId);
    } else {
      this.offsets.set(chatId, committed);
    }
  }

  private schedulePersist(): Promise<void> {
    const snapshot = new Map(this.offsets);
    const write = this.writeChain.then(() => this.writeToDisk(snapshot));
    // A failed write must not wedge the chain for the writes queued behind it
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async writeToDisk(snapshot: Map<string, string>): Promise<void> {
    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    const body = JSON.stringify(Object.fromEntries(snapshot), null, 2) + '\n';

    try {
      await writeFile(tmpPath, body, 'utf8');
      await rename(tmpPath, this.filePath);
      this.committed = snapshot;
    } catch (error) {
      await unlink(tmpPath).catch((unlinkError: unknown) => {
        this.logger.debug({ error: unlinkError, tmpPath }, 'No temp file to clean up');
      });
      this.logger.error({ error, filePath: this.filePath }, 'Failed to persist offsets');
      throw new PersistenceFailedError(`Failed to write offsets file ${this.filePath}`, { cause: error });
    }
  }
}
