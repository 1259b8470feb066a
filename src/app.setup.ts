import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { AppConfig } from './config/configuration';

/**
 * Global pipes, filters and interceptors, shared by the server entry point
 * and the end-to-end tests. Must run before `init()` so the JSON parser
 * replaces the default one.
 */
export function configureApp(
  app: NestExpressApplication,
): NestExpressApplication {
  const config = app.get(ConfigService).get<AppConfig>('app');

  app.enableCors();

  // JSON resumes get the same size budget as uploaded files
  app.useBodyParser('json', {
    limit: config?.upload.maxFileSize || 10485760,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalInterceptors(new LoggingInterceptor());

  return app;
}
