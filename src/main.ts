import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');

function isAllowedOrigin(origin: string, allowedOrigins: string[]): boolean {
  if (allowedOrigins.includes(origin)) return true;

  if (process.env.NODE_ENV === 'development') {
    return new URL(origin).hostname === 'localhost';
  }

  return false;
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const configService = app.get(ConfigService);

  const allowedOrigins =
    configService.get<string>('ALLOWED_ORIGINS')?.split(',') || [];

  app.enableCors({
    origin: (
      origin: string | undefined,
      callback: (err: Error | null, allow?: boolean) => void,
    ) => {
      if (!origin) {
        return callback(null, true);
      }

      try {
        if (isAllowedOrigin(origin, allowedOrigins)) {
          callback(null, true);
        } else {
          logger.warn(`CORS: Rejected origin ${origin}`);
          callback(null, false);
        }
      } catch (error) {
        logger.warn(`CORS: Invalid origin format ${origin}`);
        callback(null, false);
      }
    },
    methods: ['GET', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
    maxAge: 86400,
    optionsSuccessStatus: 200,
  });

  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Category Descendant Cache')
    .setDescription('Cached lookups of category subtree ids')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = Number(configService.get<string>('PORT') || 8084);
  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
