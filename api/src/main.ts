import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  // Registry loads artifacts in onModuleInit, before listen() accepts traffic
  const app = await NestFactory.create(AppModule);
  configureApp(app);

  // SIGTERM/SIGINT -> unload model, flush audit queue
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port') ?? 8000;
  await app.listen(port);
  Logger.log(`Solar forecast API listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((e: unknown) => {
  Logger.error(`Server failed to start: ${String(e)}`, 'Bootstrap');
  process.exit(1);
});
