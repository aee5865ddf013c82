import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { LoggerService } from './common/services/logger.service';
import { validateEnv } from './common/config/env.validation';
import type { EnvConfig } from './common/config/env.validation';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('Unhandled Rejection:', reason);
});

process.on('uncaughtException', (error: Error) => {
  console.error('Uncaught Exception thrown:', error);
  console.error('Stack trace:', error.stack);
  // Give the process time to log before exiting
  setTimeout(() => {
    process.exit(1);
  }, 1000);
});

function parseCorsOrigins(value: string | undefined): string[] | boolean {
  if (!value) return true;
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}

async function bootstrap() {
  // Validate before Nest boots so the logger can be configured from it
  const env = validateEnv();
  const development = env.NODE_ENV === 'development';

  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  app.useLogger(new LoggerService({ level: env.LOG_LEVEL, logDir: env.LOG_DIR, development }));

  app.use(helmet());
  app.enableCors({ origin: parseCorsOrigins(env.CORS_ORIGINS) });
  app.useGlobalFilters(new GlobalExceptionFilter({ development }));

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Quick-Commerce Analytics API')
    .setDescription('Delivery, cancellation, stockout, rider and picking analytics')
    .setVersion('1.0.0')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));

  app.enableShutdownHooks();

  const port = app.get<ConfigService<EnvConfig, true>>(ConfigService).get('PORT', { infer: true });
  await app.listen(port);

  console.log(`Application is running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
