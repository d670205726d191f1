import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { SchemaManagerService } from './modules/schema/schema-manager.service';

const logger = new Logger('Bootstrap');

// Applies validators and indexes to eduhub_db, then exits.
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    await app.get(SchemaManagerService).initialize();
    logger.log('eduhub_db collections, validators and indexes are in place');
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error('Provisioning failed', error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
