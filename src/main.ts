import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './runtime-env';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);

  app.enableCors({
    origin: config.corsOrigin,
  });
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`BOM service listening on port ${config.port}.`, 'Bootstrap');
}

void bootstrap();
