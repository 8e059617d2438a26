import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConnectionService } from './dal/connection/connection.service';
import { JSONLogger } from './utils/logger';

const logger = new JSONLogger('Bootstrap');

/**
 * Opens the store (synchronizing the schema when `DB_SYNCHRONIZE` is set),
 * reports its health and shuts down. Exits non-zero when the store is
 * unreachable.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: new JSONLogger('Nest'),
  });

  const report = await app.get(ConnectionService).healthCheck();
  if (report.healthy) {
    logger.log('Database is reachable', { ...report });
  } else {
    logger.error('Database is unreachable', undefined, { ...report });
    process.exitCode = 1;
  }

  await app.close();
}

bootstrap().catch((error: unknown) => {
  logger.fatal('Bootstrap failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
