import { afterEach, describe, expect, it } from 'vitest';
import { MemoryStorageAdapter, createMemoryStorage } from '../../../storage-memory/src/adapter.js';
import { DocketError, StorageError } from '../errors/docket-error.js';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { ObserverRegistry } from '../observers/registry.js';
import type { StorageConfig } from '../types/storage.js';
import { Database } from './database.js';
import { Document } from './document.js';

class User extends Document {
  static override readonly collectionName = 'users';
}

class Post extends Document {}

class UnavailableStorage extends MemoryStorageAdapter {
  override isAvailable(): boolean {
    return false;
  }
}

class FailingStorage extends MemoryStorageAdapter {
  override async initialize(_config: StorageConfig): Promise<void> {
    throw new Error('connection refused');
  }
}

describe('Database', () => {
  let db: Database | undefined;

  afterEach(async () => {
    if (db?.isOpen) {
      await db.close();
    }
    db = undefined;
  });

  describe('Database.create()', () => {
    it('should create and initialize a database', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      expect(db).toBeInstanceOf(Database);
      expect(db.name).toBe('test-db');
      expect(db.isOpen).toBe(true);
    });

    it('should use the given observer registry', async () => {
      const observers = new ObserverRegistry();
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage(), observers });

      expect(db.observers).toBe(observers);
    });

    it('should throw for an unavailable storage driver', async () => {
      const error = await Database.create({ name: 'test-db', storage: new UnavailableStorage() }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ code: 'DOCKET_S301' });
    });

    it('should wrap driver initialization failures', async () => {
      const error = await Database.create({ name: 'test-db', storage: new FailingStorage() }).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({ code: 'DOCKET_S303', context: { driver: 'memory', database: 'test-db' } });
      expect(DocketError.isDocketError(error) && error.cause).toBeInstanceOf(Error);
    });
  });

  describe('repository()', () => {
    it('should return the same repository on subsequent calls', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      expect(db.repository(User)).toBe(db.repository(User));
      expect(db.repository(User)).not.toBe(db.repository(Post));
    });

    it('should bind the collection name of the class', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      expect(db.repository(User).collection).toBe('users');
      expect(db.repository(Post).collection).toBe('Post');
    });

    it('should reject a reserved collection name', async () => {
      class Internal extends Document {
        static override readonly collectionName = 'system.internal';
      }
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      expect(() => db?.repository(Internal)).toThrow(DocketError);
    });

    it('should share one store between repositories of the same collection', async () => {
      class Admin extends Document {
        static override readonly collectionName = 'users';
      }
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      await db.repository(User).insert(new User({ name: 'Ada' }));

      const admin = await db.repository(Admin).findOne({ name: 'Ada' });
      expect(admin).toBeInstanceOf(Admin);
    });
  });

  describe('listCollections()', () => {
    it('should list the collections that have been accessed', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });
      db.repository(User);
      db.repository(Post);

      expect(await db.listCollections()).toEqual(['users', 'Post']);
    });
  });

  describe('close()', () => {
    it('should refuse every later call', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });
      const users = db.repository(User);

      await db.close();

      expect(db.isOpen).toBe(false);
      expect(() => db?.repository(User)).toThrow(StorageError);
      await expect(users.insert(new User({ name: 'Ada' }))).rejects.toMatchObject({ code: 'DOCKET_S305' });
      await expect(users.count()).rejects.toBeInstanceOf(StorageError);
      await expect(db.listCollections()).rejects.toMatchObject({ code: 'DOCKET_S305' });
    });

    it('should complete change streams', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });
      let completed = false;
      db.repository(User)
        .changes()
        .subscribe({ complete: () => (completed = true) });

      await db.close();

      expect(completed).toBe(true);
    });

    it('should be safe to call twice', async () => {
      db = await Database.create({ name: 'test-db', storage: createMemoryStorage() });

      await db.close();
      await expect(db.close()).resolves.toBeUndefined();
    });
  });

  describe('logging', () => {
    it('should log repository writes under a child module', async () => {
      const entries: LogEntry[] = [];
      db = await Database.create({
        name: 'test-db',
        storage: createMemoryStorage(),
        logger: createLogger({ level: 'debug', handler: (entry) => entries.push(entry) }),
      });

      await db.repository(User).insert(new User({ name: 'Ada' }));

      const insert = entries.find((entry) => entry.message === 'insert completed');
      expect(insert?.module).toBe('docket:users');
      expect(insert?.context).toMatchObject({ collection: 'users' });
    });
  });
});
