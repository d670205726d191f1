import { Test } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { mongo } from 'mongoose';
import {
  ConnectivityError,
  IndexConflictError,
  SchemaApplicationError,
} from '../../common/errors/eduhub.errors';
import { EDUHUB_INDEXES } from './indexes';
import { SchemaManagerService } from './schema-manager.service';
import { USERS_SCHEMA } from './validators/collection-schemas';
import { toJsonSchemaValidator } from './validators/field-spec';

describe('SchemaManagerService', () => {
  let service: SchemaManagerService;
  let existing: string[];
  let calls: string[];
  const collections = {
    users: { createIndexes: jest.fn() },
    courses: { createIndexes: jest.fn() },
    enrollments: { createIndexes: jest.fn() },
  };
  const db = {
    listCollections: jest.fn(),
    createCollection: jest.fn(),
    command: jest.fn(),
    collection: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    existing = [];
    calls = [];

    db.listCollections.mockImplementation((filter: { name: string }) => ({
      toArray: async () => existing.filter((n) => n === filter.name).map((n) => ({ name: n })),
    }));
    db.createCollection.mockImplementation(async (name: string) => {
      calls.push(`create:${name}`);
      existing.push(name);
    });
    db.command.mockImplementation(async (cmd: { collMod: string }) => {
      calls.push(`collMod:${cmd.collMod}`);
      return { ok: 1 };
    });
    db.collection.mockImplementation((name: keyof typeof collections) => collections[name]);
    for (const [name, coll] of Object.entries(collections)) {
      coll.createIndexes.mockImplementation(async (indexes: mongo.IndexDescription[]) => {
        calls.push(`indexes:${name}`);
        return indexes.map((i) => i.name);
      });
    }

    const moduleRef = await Test.createTestingModule({
      providers: [SchemaManagerService, { provide: getConnectionToken(), useValue: { db } }],
    }).compile();
    service = moduleRef.get(SchemaManagerService);
  });

  describe('setup', () => {
    it('creates a missing collection and applies its validator', async () => {
      await service.setup('users', USERS_SCHEMA);

      expect(db.createCollection).toHaveBeenCalledWith('users');
      expect(db.command).toHaveBeenCalledWith({
        collMod: 'users',
        validator: toJsonSchemaValidator(USERS_SCHEMA),
        validationLevel: 'strict',
        validationAction: 'error',
      });
    });

    it('reapplies the same validator without recreating the collection', async () => {
      await service.setup('users', USERS_SCHEMA);
      await service.setup('users', USERS_SCHEMA);

      expect(db.createCollection).toHaveBeenCalledTimes(1);
      expect(db.command).toHaveBeenCalledTimes(2);
      expect(db.command.mock.calls[0]).toEqual(db.command.mock.calls[1]);
    });

    it('applies the validator on both sides of a concurrent first setup', async () => {
      db.createCollection.mockImplementation(async (name: string) => {
        if (existing.includes(name)) {
          throw new mongo.MongoServerError({ message: `Collection ${name} already exists`, code: 48 });
        }
        existing.push(name);
      });

      const results = await Promise.allSettled([
        service.setup('users', USERS_SCHEMA),
        service.setup('users', USERS_SCHEMA),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(db.createCollection).toHaveBeenCalledTimes(2);
      expect(db.command).toHaveBeenCalledTimes(2);
    });

    it('still fails on other collection creation errors', async () => {
      db.createCollection.mockRejectedValueOnce(
        new mongo.MongoServerError({ message: 'not authorized on eduhub_db', code: 13 }),
      );

      await expect(service.setup('users', USERS_SCHEMA)).rejects.toBeInstanceOf(SchemaApplicationError);
      expect(db.command).not.toHaveBeenCalled();
    });

    it('raises SchemaApplicationError when the validator is rejected', async () => {
      db.command.mockRejectedValueOnce(
        new mongo.MongoServerError({ message: 'unknown $jsonSchema keyword', code: 9 }),
      );

      await expect(service.setup('users', USERS_SCHEMA)).rejects.toBeInstanceOf(SchemaApplicationError);
    });

    it('raises ConnectivityError when the server is unreachable', async () => {
      db.listCollections.mockImplementationOnce(() => ({
        toArray: async () => {
          throw new mongo.MongoNetworkError('connection refused');
        },
      }));

      await expect(service.setup('users', USERS_SCHEMA)).rejects.toBeInstanceOf(ConnectivityError);
    });
  });

  describe('createIndexes', () => {
    it('declares the fixed index set per collection', async () => {
      await service.createIndexes();

      expect(collections.users.createIndexes).toHaveBeenCalledWith(EDUHUB_INDEXES.users);
      expect(collections.courses.createIndexes).toHaveBeenCalledWith(EDUHUB_INDEXES.courses);
      expect(collections.enrollments.createIndexes).toHaveBeenCalledWith(EDUHUB_INDEXES.enrollments);
    });

    it('marks email and student/course pairs unique', () => {
      expect(EDUHUB_INDEXES.users).toContainEqual({ key: { email: 1 }, name: 'email_unique', unique: true });
      expect(EDUHUB_INDEXES.enrollments).toEqual([
        { key: { studentId: 1, courseId: 1 }, name: 'student_course_unique', unique: true },
      ]);
    });

    it('raises IndexConflictError when existing data holds duplicates', async () => {
      collections.enrollments.createIndexes.mockRejectedValueOnce(
        new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }),
      );

      const err = service.createIndexes();
      await expect(err).rejects.toBeInstanceOf(IndexConflictError);
      await expect(err).rejects.toMatchObject({ collection: 'enrollments' });
    });
  });

  it('initialize sets up every collection before building indexes', async () => {
    await service.initialize();

    expect(calls).toEqual([
      'create:users',
      'collMod:users',
      'create:courses',
      'collMod:courses',
      'create:enrollments',
      'collMod:enrollments',
      'indexes:users',
      'indexes:courses',
      'indexes:enrollments',
    ]);
  });

  it('refuses to run without an open connection', async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [SchemaManagerService, { provide: getConnectionToken(), useValue: { db: undefined } }],
    }).compile();

    await expect(moduleRef.get(SchemaManagerService).createIndexes()).rejects.toBeInstanceOf(
      ConnectivityError,
    );
  });
});
