// Load .env.local first if present, otherwise .env
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

(() => {
  const root = process.cwd();
  const envLocal = path.resolve(root, '.env.local');
  dotenv.config({ path: fs.existsSync(envLocal) ? envLocal : path.resolve(root, '.env') });
})();

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ErrorLog } from './error-log/error-log';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Error Log API')
    .setDescription('Browse the errors recorded for this application')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = Number(process.env.PORT) || 3001;
  const host = process.env.HOST || '0.0.0.0';
  await app.listen(port, host);

  const errors = app.get(ErrorLog);
  try {
    const total = await errors.getErrors(0, 0);
    logger.log(`Error store reachable; ${total} errors logged for "${errors.applicationName}"`);
  } catch (e) {
    logger.error(`Error store check failed: ${e instanceof Error ? e.message : String(e)}`);
  }

  logger.log(`API running on http://${host}:${port}/api`);
  logger.log(`Swagger at        http://${host}:${port}/api/docs`);
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
