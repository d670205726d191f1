import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { buildMongoUri, MONGO, MongoConfig } from '../config/config.env';

@Module({
  imports: [
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const mongo = config.getOrThrow<MongoConfig>(MONGO);
        return {
          uri: buildMongoUri(mongo),
          dbName: mongo.dbName,
          serverSelectionTimeoutMS: mongo.serverSelectionTimeoutMS,
          // collections and indexes are owned by SchemaManagerService
          autoIndex: false,
          autoCreate: false,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
