import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // Security + performance
  app.use(helmet());
  app.use(compression());

  // Global URL prefix and versioning (e.g., /api/v1/...)
  app.setGlobalPrefix('api');
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Strict request validation everywhere
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // strip unknown props
      forbidNonWhitelisted: true,
      transform: true, // auto-transform DTO primitives
    }),
  );

  const port = app.get(ConfigService).get<number>('port') ?? 4000;
  await app.listen(port);
  logger.log(`API listening on http://localhost:${port}/api/v1`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Startup failed: ${String(err)}`);
  process.exit(1);
});
