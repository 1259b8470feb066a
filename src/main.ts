import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { AppConfig } from './config/configuration';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = configureApp(
    await NestFactory.create<NestExpressApplication>(AppModule),
  );

  const config = app.get(ConfigService).get<AppConfig>('app');
  const port = config?.port ?? 3000;
  const host = config?.host ?? '0.0.0.0';

  app.enableShutdownHooks();
  await app.listen(port, host);
  logger.log(`Application is running on: http://${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
