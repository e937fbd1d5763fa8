import {
  MongoBulkWriteError,
  MongoClient,
  type Collection,
  type Document,
  type BulkWriteOptions,
} from "mongodb";
import { DataRecord } from "../../types/data-model.js";
import { MongoConnectionError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { InsertionMetrics, RecordSink } from "./types.js";

/**
 * Configuration options for MongoDB insertion
 */
export interface MongoInserterConfig {
  uri: string;
  database: string;
  batchSize?: number;
  orderedInserts?: boolean;
}

/**
 * The part of a collection the inserter needs
 */
export type InsertTarget = Pick<Collection<Document>, "insertMany">;

export interface BatchInsertOptions {
  batchSize: number;
  ordered: boolean;
}

/**
 * Insert documents in fixed-size batches. A failed batch is counted and
 * logged; later batches still run.
 */
export async function insertInBatches(
  collection: InsertTarget,
  documents: readonly Document[],
  options: BatchInsertOptions,
): Promise<Pick<InsertionMetrics, "totalDocuments" | "insertedDocuments" | "failedInserts">> {
  let insertedDocuments = 0;
  let failedInserts = 0;

  const bulkOptions: BulkWriteOptions = {
    ordered: options.ordered,
    bypassDocumentValidation: false,
  };

  for (let start = 0; start < documents.length; start += options.batchSize) {
    const batch = documents.slice(start, start + options.batchSize);
    try {
      const result = await collection.insertMany(batch, bulkOptions);
      insertedDocuments += result.insertedCount;
    } catch (error) {
      logger.error("Bulk insert failed", { error: String(error) });
      // Some documents of the batch may have gone in before the failure
      const successfulInBatch = error instanceof MongoBulkWriteError ? error.insertedCount : 0;
      insertedDocuments += successfulInBatch;
      failedInserts += batch.length - successfulInBatch;
    }
  }

  return { totalDocuments: documents.length, insertedDocuments, failedInserts };
}

/**
 * MongoDB emitter for normalized records
 */
export class MongoInserter implements RecordSink {
  private readonly client: MongoClient;
  private readonly config: Required<MongoInserterConfig>;

  constructor(config: MongoInserterConfig) {
    this.config = {
      batchSize: 1000,
      orderedInserts: false,
      ...config,
    };

    this.client = new MongoClient(this.config.uri, {
      writeConcern: { w: "majority" },
      serverSelectionTimeoutMS: 10000,
      socketTimeoutMS: 60000,
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      logger.info(`Connected to MongoDB database: ${this.config.database}`);
    } catch (error) {
      throw new MongoConnectionError(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
        { database: this.config.database },
        { cause: error },
      );
    }
  }

  async insertRecords(collectionName: string, records: readonly DataRecord[]): Promise<InsertionMetrics> {
    const startTime = Date.now();
    const collection = this.client.db(this.config.database).collection(collectionName);

    const metrics = await insertInBatches(collection, records, {
      batchSize: this.config.batchSize,
      ordered: this.config.orderedInserts,
    });

    const result = { collection: collectionName, ...metrics, durationMs: Date.now() - startTime };
    logger.info("Records inserted", result);
    return result;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Factory function for creating connected MongoInserter instances
 */
export async function createMongoInserter(config: MongoInserterConfig): Promise<MongoInserter> {
  const inserter = new MongoInserter(config);
  await inserter.connect();
  return inserter;
}
