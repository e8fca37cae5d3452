import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createMemoryStorage } from '../../../storage-memory/src/adapter.js';
import { QueryError } from '../errors/docket-error.js';
import { Database } from './database.js';
import { Document } from './document.js';
import type { Repository } from './repository.js';

class Task extends Document {
  static override readonly collectionName = 'tasks';
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function titles(tasks: Task[]): unknown[] {
  return tasks.map((task) => task.get('title'));
}

describe('Cursor', () => {
  let db: Database;
  let tasks: Repository<Task>;

  beforeEach(async () => {
    db = await Database.create({ name: 'cursor-db', storage: createMemoryStorage() });
    tasks = db.repository(Task);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('empty results', () => {
    it('should return null on every advance', async () => {
      const cursor = tasks.find();

      expect(await cursor.next()).toBeNull();
      expect(await cursor.next()).toBeNull();
      expect(cursor.exhausted).toBe(true);
      expect(await cursor.hasNext()).toBe(false);
    });
  });

  describe('with records', () => {
    beforeEach(async () => {
      for (const [title, priority] of [
        ['Write', 2],
        ['Read', 1],
        ['Cook', 3],
        ['Walk', 2],
      ] as const) {
        await tasks.insert(new Task({ title, priority }));
      }
    });

    it('should yield decoded persisted documents', async () => {
      const first = await tasks.find({ title: 'Read' }).next();

      expect(first).toBeInstanceOf(Task);
      expect(first?.state).toBe('persisted');
      expect(first?.get('priority')).toBe(1);
      expect(first?.id).not.toBeNull();
    });

    it('should apply sort, skip and limit set by chaining', async () => {
      const cursor = tasks.find().sort({ priority: -1, title: 1 }).skip(1).limit(2);

      expect(titles(await cursor.toArray())).toEqual(['Walk', 'Write']);
    });

    it('should merge chained sort keys over options', async () => {
      const cursor = tasks.find({}, { sort: { priority: 1 } }).sort({ title: -1 });

      expect(titles(await cursor.toArray())).toEqual(['Read', 'Write', 'Walk', 'Cook']);
    });

    it('should refuse to change the query once started', async () => {
      const cursor = tasks.find();
      await cursor.next();

      expect(cursor.started).toBe(true);
      expect(() => cursor.sort({ title: 1 })).toThrow(QueryError);
      expect(thrownBy(() => cursor.limit(1))).toMatchObject({ code: 'DOCKET_Q204' });
    });

    it('should reject invalid skip and limit values', () => {
      const cursor = tasks.find();

      expect(thrownBy(() => cursor.skip(-1))).toMatchObject({ code: 'DOCKET_Q205' });
      expect(() => cursor.limit(1.5)).toThrow(QueryError);
      expect(cursor.started).toBe(false);
    });

    it('should look ahead without losing a document', async () => {
      const cursor = tasks.find({}, { sort: { priority: 1 }, limit: 2 });

      expect(await cursor.hasNext()).toBe(true);
      expect(await cursor.hasNext()).toBe(true);
      expect((await cursor.next())?.get('title')).toBe('Read');
      expect((await cursor.next())?.get('priority')).toBe(2);
      expect(await cursor.hasNext()).toBe(false);
      expect(await cursor.next()).toBeNull();
    });

    it('should iterate with for await', async () => {
      const seen: unknown[] = [];
      for await (const task of tasks.find({ priority: 2 }, { sort: { title: 1 } })) {
        seen.push(task.get('title'));
      }

      expect(seen).toEqual(['Walk', 'Write']);
    });

    it('should pass the index to forEach', async () => {
      const seen: string[] = [];

      await tasks
        .find({}, { sort: { title: 1 } })
        .forEach((task, index) => void seen.push(`${index}:${String(task.get('title'))}`));

      expect(seen).toEqual(['0:Cook', '1:Read', '2:Walk', '3:Write']);
    });

    it('should count matches regardless of limit or progress', async () => {
      const cursor = tasks.find({ priority: { $gte: 2 } }).limit(1);
      await cursor.next();

      expect(await cursor.count()).toBe(3);
    });

    it('should return null once closed', async () => {
      const cursor = tasks.find();
      await cursor.hasNext();

      await cursor.close();

      expect(await cursor.next()).toBeNull();
      expect(cursor.exhausted).toBe(true);
    });

    it('should keep returning null after exhaustion even when records are added', async () => {
      const cursor = tasks.find({ title: 'Read' });
      await cursor.toArray();

      await tasks.insert(new Task({ title: 'Read', priority: 9 }));

      expect(await cursor.next()).toBeNull();
      expect(await tasks.find({ title: 'Read' }).toArray()).toHaveLength(2);
    });
  });
});
