import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppEnv, corsOrigins, missingProviderKeys } from './config/env.validation';
import { CorsIoAdapter } from './config/socket-io.adapter';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigService<AppEnv, true>>(ConfigService);

  const origins = corsOrigins(config.get('CORS_ORIGINS', { infer: true }));
  app.enableCors({
    origin: origins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept'],
    credentials: false,
  });
  app.useWebSocketAdapter(new CorsIoAdapter(app, origins));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const missing = missingProviderKeys({
    OPENWEATHER_API_KEY: config.get('OPENWEATHER_API_KEY', { infer: true }),
    ALPHA_VANTAGE_API_KEY: config.get('ALPHA_VANTAGE_API_KEY', { infer: true }),
    NEWS_API_KEY: config.get('NEWS_API_KEY', { infer: true }),
  });
  if (missing.length > 0) {
    logger.warn(`Missing API keys: ${missing.join(', ')}. Those lookups will report a configuration problem.`);
  }

  const host = config.get('HOST', { infer: true });
  const port = config.get('PORT', { infer: true });
  await app.listen(port, host);
  logger.log(`Listening on http://${host}:${port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
