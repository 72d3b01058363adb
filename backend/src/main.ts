import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { BufferLogger } from './common/buffer-logger';
import { getErrorMessage, getErrorStack } from './common/errors/storefront.errors';
import { appConfig, type AppConfig } from './config/app.config';
import { TelegramBotService } from './modules/bot/telegram-bot.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  try {
    const app = await NestFactory.create(AppModule, { logger: new BufferLogger() });
    const config = app.get<AppConfig>(appConfig.KEY);

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );

    const webhook = app.get(TelegramBotService).webhookMiddleware();
    if (webhook) app.use(webhook);

    // SIGINT/SIGTERM stop long polling through TelegramBotService.onModuleDestroy.
    app.enableShutdownHooks();

    await app.listen(config.port);
    logger.log(`Application is running on: http://localhost:${config.port}`);
  } catch (error: unknown) {
    logger.error(`Failed to start application: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}

void bootstrap();
