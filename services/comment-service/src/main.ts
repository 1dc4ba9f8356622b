import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { Request, Response } from 'express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const logger = new Logger('Comment Service');

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));

  const httpAdapter = app.getHttpAdapter();
  httpAdapter.get('/', (req: Request, res: Response) => {
    res.send('Comment service is running');
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`HTTP server listening on port ${port}`);
  logger.log(`API available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
