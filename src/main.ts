import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { QuizCompletionClient } from './quiz/completion.client';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(logger);
  const config = app.get(ConfigService);

  const allowedOrigins = (
    config.get<string>('FRONTEND_URLS') ?? 'http://localhost:3000'
  )
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  app.enableCors({
    origin: allowedOrigins,
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const isProduction = config.get<string>('NODE_ENV') === 'production';
  const port = Number(config.get<string>('PORT') ?? 3001);
  await app.listen(port);

  const generation = app.get(QuizCompletionClient).isEnabled
    ? 'model-generated'
    : 'placeholder-only';
  logger.log(
    `Quiz API running on ${
      isProduction ? 'production' : 'local'
    } port ${port} (${generation} quizzes)`,
  );
}
bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  const stack =
    error instanceof Error ? (error.stack ?? error.message) : String(error);
  logger.error('Failed to bootstrap application', stack);
  process.exit(1);
});
