import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { toNestLogLevels } from '@libs/core';
import { WorkerModule } from './worker.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(WorkerModule, {
    logger: toNestLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();
  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3001);
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(port, host);
  logger.log(`Worker listening on ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('WorkerBootstrap').fatal(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
