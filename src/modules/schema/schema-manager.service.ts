import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, mongo } from 'mongoose';
import { ConnectivityError } from '../../common/errors/eduhub.errors';
import { NAMESPACE_EXISTS, translateMongoError } from '../../common/errors/mongo-error.translator';
import { EDUHUB_INDEXES } from './indexes';
import { COLLECTION_SCHEMAS, COLLECTIONS, CollectionName } from './validators/collection-schemas';
import { CollectionSchema, toJsonSchemaValidator } from './validators/field-spec';

@Injectable()
export class SchemaManagerService {
  private readonly logger = new Logger(SchemaManagerService.name);

  constructor(@InjectConnection() private readonly connection: Connection) {}

  /** Validators for every collection, then the index set. Safe to rerun. */
  async initialize(): Promise<void> {
    for (const name of Object.values(COLLECTIONS)) {
      await this.setup(name, COLLECTION_SCHEMAS[name]);
    }
    await this.createIndexes();
  }

  /**
   * Creates the collection when missing, then (re)applies its validator.
   * Documents already stored are not revalidated by MongoDB.
   */
  async setup(name: CollectionName, schema: CollectionSchema): Promise<void> {
    const db = this.db();
    try {
      const existing = await db.listCollections({ name }, { nameOnly: true }).toArray();
      if (existing.length === 0) {
        this.logger.log(`Creating collection: ${name}`);
        await this.createCollection(db, name);
      }

      this.logger.log(`Applying validation to collection: ${name}`);
      await db.command({
        collMod: name,
        validator: toJsonSchemaValidator(schema),
        validationLevel: 'strict',
        validationAction: 'error',
      });
    } catch (error) {
      throw translateMongoError(error, 'schema', name);
    }
  }

  async createIndexes(): Promise<void> {
    const db = this.db();
    for (const [name, indexes] of Object.entries(EDUHUB_INDEXES)) {
      try {
        const created = await db.collection(name).createIndexes(indexes);
        this.logger.log(`Indexes on ${name}: ${created.join(', ')}`);
      } catch (error) {
        throw translateMongoError(error, 'index', name);
      }
    }
  }

  // a concurrent setup may have created it since listCollections answered
  private async createCollection(db: mongo.Db, name: CollectionName): Promise<void> {
    try {
      await db.createCollection(name);
    } catch (error) {
      if (error instanceof mongo.MongoServerError && error.code === NAMESPACE_EXISTS) {
        this.logger.log(`Collection ${name} already created by a concurrent setup`);
        return;
      }
      throw error;
    }
  }

  private db(): mongo.Db {
    const db = this.connection.db;
    if (!db) {
      throw new ConnectivityError('MongoDB connection is not open');
    }
    return db;
  }
}
