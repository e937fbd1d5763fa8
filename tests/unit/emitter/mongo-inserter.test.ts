import { describe, it, expect } from 'vitest';
import type { Document } from 'mongodb';
import { insertInBatches, type InsertTarget } from '../../../src/lib/emitter/mongo-inserter.js';

function fakeCollection(failOnBatch?: number) {
  const batches: Document[][] = [];
  const collection: InsertTarget = {
    insertMany: async (docs) => {
      const index = batches.length;
      batches.push([...docs]);
      if (index === failOnBatch) {
        throw new Error('duplicate key');
      }
      return { acknowledged: true, insertedCount: docs.length, insertedIds: {} };
    },
  };
  return { collection, batches };
}

describe('insertInBatches', () => {
  const records = Array.from({ length: 5 }, (_, i) => ({ id: String(i), nome: `user-${i}` }));

  it('should insert all documents in fixed-size batches', async () => {
    const { collection, batches } = fakeCollection();

    const metrics = await insertInBatches(collection, records, { batchSize: 2, ordered: false });

    expect(batches.map((batch) => batch.length)).toEqual([2, 2, 1]);
    expect(metrics).toEqual({ totalDocuments: 5, insertedDocuments: 5, failedInserts: 0 });
  });

  it('should count a failed batch and continue with the next', async () => {
    const { collection, batches } = fakeCollection(1);

    const metrics = await insertInBatches(collection, records, { batchSize: 2, ordered: true });

    expect(batches).toHaveLength(3);
    expect(metrics).toEqual({ totalDocuments: 5, insertedDocuments: 3, failedInserts: 2 });
  });

  it('should do nothing for no documents', async () => {
    const { collection, batches } = fakeCollection();
    const metrics = await insertInBatches(collection, [], { batchSize: 10, ordered: false });
    expect(batches).toHaveLength(0);
    expect(metrics.totalDocuments).toBe(0);
  });
});
