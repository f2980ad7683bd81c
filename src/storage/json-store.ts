import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { CryptoService } from '../services/crypto.service';
import { CollectionItems, CollectionName } from '../types/entry-pass.types';
import { StorageError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('json-store');

interface CollectionLayout {
  file: string;
  key: string;
}

export const COLLECTION_LAYOUT: Record<CollectionName, CollectionLayout> = {
  users: { file: 'users.json', key: 'users' },
  tickets: { file: 'tickets.json', key: 'tickets' },
  attendance: { file: 'attendance.json', key: 'records' },
};

export interface Mutation<T, R> {
  items: T[];
  result: R;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encrypted JSON document store. One file per collection, each holding a
 * single encrypted `{ "<key>": [...] }` document.
 *
 * Writes to a collection run one at a time; each write lands in a temp file
 * that is renamed over the old one.
 */
export class JsonStore {
  private readonly queues = new Map<CollectionName, Promise<unknown>>();

  constructor(
    private readonly dataDir: string,
    private readonly cryptoService: CryptoService
  ) {}

  filePath(name: CollectionName): string {
    return path.join(this.dataDir, COLLECTION_LAYOUT[name].file);
  }

  async read<K extends CollectionName>(name: K): Promise<CollectionItems[K][]> {
    const filePath = this.filePath(name);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return [];
      }
      log.error({ err: error, collection: name }, 'Failed to read collection');
      throw new StorageError(`Failed to read ${name}`, name);
    }

    if (raw.trim() === '') {
      return [];
    }

    let document: unknown;
    try {
      document = JSON.parse(this.cryptoService.decrypt(raw.trim(), 'storage'));
    } catch (error) {
      log.error({ err: error, collection: name }, 'Collection file could not be decrypted');
      throw new StorageError(`Collection ${name} is unreadable`, name);
    }

    const key = COLLECTION_LAYOUT[name].key;
    if (!isRecord(document)) {
      throw new StorageError(`Collection ${name} has an invalid structure`, name);
    }
    const items = document[key];
    if (items === undefined) {
      return [];
    }
    if (!Array.isArray(items)) {
      throw new StorageError(`Collection ${name} has an invalid structure`, name);
    }
    return items;
  }

  /**
   * Runs `mutate` against the current items and persists what it returns.
   * Calls for the same collection are serialized, so read-check-write
   * sequences inside `mutate` are atomic with respect to each other.
   */
  update<K extends CollectionName, R>(
    name: K,
    mutate: (items: CollectionItems[K][]) => Mutation<CollectionItems[K], R>
  ): Promise<R> {
    return this.enqueue(name, async () => {
      const current = await this.read(name);
      const { items, result } = mutate(current);
      await this.write(name, items);
      return result;
    });
  }

  clear(name: CollectionName): Promise<void> {
    return this.enqueue(name, () => this.write(name, []));
  }

  private async write<K extends CollectionName>(name: K, items: CollectionItems[K][]): Promise<void> {
    const filePath = this.filePath(name);
    const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`;
    const document = { [COLLECTION_LAYOUT[name].key]: items };

    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(tempPath, this.cryptoService.encrypt(JSON.stringify(document), 'storage'), 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      log.error({ err: error, collection: name }, 'Failed to write collection');
      await fs.rm(tempPath, { force: true });
      throw new StorageError(`Failed to write ${name}`, name);
    }

    log.debug({ collection: name, count: items.length }, 'Collection written');
  }

  private enqueue<T>(name: CollectionName, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(name) ?? Promise.resolve();
    const run = previous.then(task, task);
    // The tail only orders the next task; failures reach callers through `run`.
    this.queues.set(
      name,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }
}
