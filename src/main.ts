import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ZodValidationPipe } from 'nestjs-zod';
import { AppModule } from './app.module';
import type { AppConfig } from './config/app.config';

async function bootstrap() {
  // rawBody dibutuhkan untuk verifikasi signature webhook
  const app = await NestFactory.create(AppModule, { rawBody: true });
  const config = app.get(ConfigService).getOrThrow<AppConfig>('app');

  // Global Prefix
  app.setGlobalPrefix('api');

  // Terapkan Validasi Zod secara Global
  app.useGlobalPipes(new ZodValidationPipe());

  // Sweeper dan koneksi database ditutup rapi saat SIGTERM
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`Server is running on: http://localhost:${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
