import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';

import { AppModule } from './app.module.js';
import { ACTIVITY_CONFIG, APP_VERSION, logLevelsFrom } from './config/activity.config.js';
import type { ActivityConfig } from './config/activity.config.js';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: logLevelsFrom(process.env.LOG_LEVEL),
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const config = new DocumentBuilder()
    .setTitle('Repository Activity Digest API')
    .setDescription('Summarizes repository activity and publishes it as discussions')
    .setVersion(APP_VERSION)
    .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'X-API-Key')
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc);

  const { server } = app.get<ActivityConfig>(ACTIVITY_CONFIG);
  await app.listen(server.port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`📚 Swagger documentation: http://localhost:${server.port}/docs`);
  logger.log(`🌍 Environment: ${process.env.NODE_ENV || 'development'}`);
  logger.log(`🔐 Authentication: ${server.requireApiKey ? '🔒 API Key Required' : '🔓 Open Access'}`);
}
bootstrap().catch((err: unknown) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
