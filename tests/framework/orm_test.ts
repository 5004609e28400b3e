/**
 * ORM Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  KVConflictError,
  Model,
  ModelValidationError,
  RecordFormatError,
  compareValues,
  field,
  query,
  readRecord,
  retryOnConflict,
  validators,
  type ModelDefinition,
} from '../../framework/orm/mod.ts';
import { openStore } from '../helpers.ts';

interface NoteData {
  title: string;
  rank: number;
  labels: string[];
}

class Note extends Model<NoteData> {
  static readonly definition: ModelDefinition = {
    name: 'Note',
    prefix: 'notes',
    fields: {
      title: { type: 'string', required: true, validate: [validators.minLength(1), validators.maxLength(8)] },
      rank: { type: 'number', required: true, validate: [validators.integer(), validators.min(0)] },
      labels: { type: 'array', required: true, validate: [validators.each(validators.maxLength(3))] },
    },
  };

  protected override get definition(): ModelDefinition {
    return Note.definition;
  }

  static fromRecord(value: unknown, versionstamp: string | null = null): Note {
    const record = readRecord(value);
    return new Note(
      {
        title: field.string(record, 'title'),
        rank: field.number(record, 'rank'),
        labels: field.stringArray(record, 'labels'),
      },
      {
        id: field.string(record, 'id'),
        createdAt: field.date(record, 'createdAt'),
        updatedAt: field.date(record, 'updatedAt'),
        versionstamp,
      }
    );
  }

  get title(): string {
    return this.data.title;
  }

  get rank(): number {
    return this.data.rank;
  }
}

test('Validators - messages', () => {
  assert.equal(validators.minLength(2)('a', 'name'), 'name must be at least 2 characters');
  assert.equal(validators.maxLength(2)('abc', 'name'), 'name must be at most 2 characters');
  assert.equal(validators.maxLength(1)(['a', 'b'], 'tags'), 'tags must have at most 1 items');
  assert.equal(validators.min(0)(-1, 'likes'), 'likes must be at least 0');
  assert.equal(validators.max(1)(1.5, 'score'), 'score must be at most 1');
  assert.equal(validators.integer()(1.5, 'likes'), 'likes must be an integer');
  assert.equal(validators.url()('not a url', 'url'), 'url must be a valid URL');
  assert.equal(validators.url()('https://img.example.test/a.png', 'url'), null);
  assert.equal(validators.pattern(/^\d+$/)('x', 'code'), 'code format is invalid');
  assert.equal(validators.oneOf(['like', 'dislike'])('love', 'action'), 'action must be one of: like, dislike');
  assert.equal(validators.each(validators.maxLength(2))(['ok', 'long'], 'tags'), 'tags item must be at most 2 characters');
});

test('Model - validation reports every failing field', () => {
  const note = new Note({ title: '', rank: 1.5, labels: ['abcd'] });

  assert.deepEqual(note.validate(), [
    'title must be at least 1 characters',
    'rank must be an integer',
    'labels item must be at most 3 characters',
  ]);
  assert.throws(() => note.assertValid(), ModelValidationError);
});

test('Model - save, find and delete', async (t) => {
  const store = await openStore(t);
  const note = new Note({ title: 'first', rank: 2, labels: ['a'] });

  await note.save(store);
  const found = await Note.findById(note.id, store);

  assert.ok(found);
  assert.equal(found.title, 'first');
  assert.equal(found.rank, 2);
  assert.equal(found.createdAt.toISOString(), note.createdAt.toISOString());
  assert.notEqual(found.versionstamp, null);

  await found.delete(store);
  assert.equal(await Note.findById(note.id, store), null);
});

test('Model - save rejects invalid data', async (t) => {
  const store = await openStore(t);
  const note = new Note({ title: 'far too long', rank: 0, labels: [] });

  await assert.rejects(note.save(store), (error: unknown) => {
    assert.ok(error instanceof ModelValidationError);
    assert.deepEqual(error.errors, ['title must be at most 8 characters']);
    return true;
  });
  assert.deepEqual(await Note.findAll(store), []);
});

test('compareValues - ordering rules', () => {
  assert.equal(compareValues(1, 2), -1);
  assert.equal(compareValues('b', 'a'), 1);
  assert.equal(compareValues(new Date(5), new Date(5)), 0);
  assert.equal(compareValues(null, 1), 1);
  assert.equal(compareValues(1, undefined), -1);
});

test('Query - filter, order, offset and limit', async (t) => {
  const store = await openStore(t);
  for (const [title, rank] of [['a', 3], ['b', 1], ['c', 3], ['d', 2], ['e', 0]] as const) {
    await new Note({ title, rank, labels: [] }).save(store);
  }

  const result = await query(Note, store)
    .filter((note) => note.rank > 0)
    .orderBy((note) => note.rank, 'desc')
    .orderBy((note) => note.title)
    .offset(1)
    .limit(2)
    .execute();

  assert.equal(result.count, 4);
  assert.deepEqual(result.data.map((note) => note.title), ['c', 'd']);
  assert.equal(result.hasMore, true);
  assert.equal(await query(Note, store).count(), 5);
});

test('KVStore - atomic check fails on a stale versionstamp', async (t) => {
  const store = await openStore(t);
  await store.set(['counter'], 1);
  const entry = await store.getEntry<number>(['counter']);
  await store.set(['counter'], 2);

  const committed = await store.commit(
    store.atomic().check({ key: ['counter'], versionstamp: entry.versionstamp }).set(['counter'], 3)
  );

  assert.equal(committed, false);
  assert.equal(await store.get<number>(['counter']), 2);
});

test('KVStore - list and getMany', async (t) => {
  const store = await openStore(t);
  await store.set(['votes', 's1', '10.0.0.1'], 'like');
  await store.set(['votes', 's1', '10.0.0.2'], 'dislike');
  await store.set(['votes', 's2', '10.0.0.1'], 'like');

  const entries = await store.list<string>(['votes', 's1']);
  const values = await store.getMany<string>([['votes', 's2', '10.0.0.1'], ['votes', 's2', '10.0.0.9']]);

  assert.deepEqual(entries.map((entry) => entry.value), ['like', 'dislike']);
  assert.deepEqual(values, ['like', null]);
});

test('retryOnConflict - retries then gives up', async () => {
  let attempts = 0;
  const result = await retryOnConflict(async () => {
    attempts++;
    if (attempts < 3) throw new KVConflictError();
    return 'done';
  });

  assert.equal(result, 'done');
  assert.equal(attempts, 3);

  let failures = 0;
  await assert.rejects(
    retryOnConflict(async () => {
      failures++;
      throw new KVConflictError();
    }, { attempts: 2, baseDelayMs: 0 }),
    KVConflictError
  );
  assert.equal(failures, 2);
});

test('retryOnConflict - concurrent writers to one key all get through', async (t) => {
  const store = await openStore(t);
  await store.set(['counters', 'likes'], 0);

  const increment = () =>
    retryOnConflict(async () => {
      const entry = await store.getEntry<number>(['counters', 'likes']);
      const op = store
        .atomic()
        .check({ key: ['counters', 'likes'], versionstamp: entry.versionstamp })
        .set(['counters', 'likes'], (entry.value ?? 0) + 1);
      await store.commitOrThrow(op);
    });

  await Promise.all(Array.from({ length: 8 }, increment));

  assert.equal(await store.get<number>(['counters', 'likes']), 8);
});

test('retryOnConflict - other errors are not retried', async () => {
  let attempts = 0;
  await assert.rejects(
    retryOnConflict(async () => {
      attempts++;
      throw new Error('disk full');
    }),
    { message: 'disk full' }
  );
  assert.equal(attempts, 1);
});

test('readRecord - rejects non-objects', () => {
  assert.throws(() => readRecord('text'), RecordFormatError);
  assert.throws(() => readRecord([1]), RecordFormatError);
  assert.throws(() => field.string(readRecord({ a: 1 }), 'a'), { message: 'Stored field a is not a string' });
  assert.equal(field.number(readRecord({}), 'likes', 0), 0);
  assert.deepEqual(field.stringArray(readRecord({ tags: ['a', 1, 'b'] }), 'tags'), ['a', 'b']);
});
