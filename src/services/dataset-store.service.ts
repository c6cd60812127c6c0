import { MongoClient, type AnyBulkWriteOperation, type Collection, type Db } from 'mongodb';
import type { AppConfig } from '../config';
import type { Dataset } from '../types';
import { DatasetStoreError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { DATASET_SCHEMA_VERSION, fromRow, toRow, type DatasetRow } from './dataset-columns';

const logger = createLogger('dataset-store');

/**
 * Source and sink of the canonical dataset: read once at the start of a
 * run, written once at the end.
 */
export interface DatasetStore {
  readDataset(): Promise<Dataset>;
  writeDataset(dataset: Dataset): Promise<void>;
}

type DatasetDocument = DatasetRow & {
  _id: string; // listing code
  position: number;
  schemaVersion: number;
};

/**
 * MongoDatasetStore
 * Keeps the dataset as one document per row, fields in column order,
 * with the row position so the sheet order survives a round trip
 */
export class MongoDatasetStore implements DatasetStore {
  private client: MongoClient;
  private db: Db | null = null;
  private collection: Collection<DatasetDocument> | null = null;
  // Rows the last read could not parse; writes must leave them in place
  private unreadRows = new Set<string>();

  constructor(private readonly options: AppConfig['mongodb']) {
    this.client = new MongoClient(options.uri);
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(this.options.database);
      this.collection = this.db.collection<DatasetDocument>(this.options.collection);

      await this.createIndexes();

      logger.info(`Connected to MongoDB ${this.options.database}.${this.options.collection}`);
    } catch (error) {
      throw new DatasetStoreError(`Failed to connect to MongoDB: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async createIndexes(): Promise<void> {
    if (!this.collection) return;

    try {
      await this.collection.createIndex({ position: 1 });
      await this.collection.createIndex({ 'Property Type': 1 });
      await this.collection.createIndex({ Listed: 1 });
    } catch (error) {
      logger.warn('Failed to create dataset indexes:', error);
    }
  }

  private requireCollection(): Collection<DatasetDocument> {
    if (!this.collection) {
      throw new DatasetStoreError('MongoDB not connected. Call connect() first.');
    }
    return this.collection;
  }

  async readDataset(): Promise<Dataset> {
    const collection = this.requireCollection();

    let documents: DatasetDocument[];
    try {
      documents = await collection.find({}).sort({ position: 1 }).toArray();
    } catch (error) {
      throw new DatasetStoreError(`Failed to read dataset: ${errorMessage(error)}`, { cause: error });
    }

    const dataset: Dataset = [];
    this.unreadRows.clear();
    for (const document of documents) {
      const result = fromRow(document);
      if (result.ok) {
        dataset.push(result.record);
      } else {
        this.unreadRows.add(document._id);
        logger.warn(`⚠️  Skipping stored row ${document._id}: ${result.reason} (left untouched in storage)`);
      }
    }

    logger.info(`Read ${dataset.length} stored records`);
    return dataset;
  }

  async writeDataset(dataset: Dataset): Promise<void> {
    const collection = this.requireCollection();

    const operations: AnyBulkWriteOperation<DatasetDocument>[] = dataset.map((record, position) => ({
      replaceOne: {
        filter: { _id: record.code },
        replacement: { ...toRow(record), position, schemaVersion: DATASET_SCHEMA_VERSION },
        upsert: true,
      },
    }));
    const keep = [...dataset.map((record) => record.code), ...this.unreadRows];

    try {
      if (operations.length > 0) {
        await collection.bulkWrite(operations, { ordered: false });
      }
      await collection.deleteMany({ _id: { $nin: keep } });
    } catch (error) {
      throw new DatasetStoreError(`Failed to write dataset: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`✅ Wrote ${dataset.length} records to ${this.options.collection}`);
  }

  /**
   * Copy the dataset into a dated collection, replacing a backup taken
   * earlier the same day. Returns the backup collection name.
   */
  async backupDataset(date: Date = new Date()): Promise<string> {
    const collection = this.requireCollection();
    const name = `${this.options.collection}_backup_${date.toISOString().slice(0, 10)}`;

    try {
      await collection.aggregate([{ $out: name }]).toArray();
    } catch (error) {
      throw new DatasetStoreError(`Failed to back up dataset: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`✅ Backed up ${this.options.collection} to ${name}`);
    return name;
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
    this.collection = null;
    logger.info('MongoDB connection closed');
  }
}
