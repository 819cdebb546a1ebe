import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { TelegramService } from './telegram/telegram.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Habilita los ganchos de apagado para que onModuleDestroy detenga el bot
  app.enableShutdownHooks();

  const telegramService = app.get(TelegramService);
  const bot = telegramService.getBot();
  const isProduction = process.env.NODE_ENV === 'production';

  if (bot && isProduction) {
    const webhookMiddleware = await telegramService.getWebhookMiddleware();
    if (webhookMiddleware) {
      app.use(webhookMiddleware);
    }

    const renderExternalUrl = process.env.RENDER_EXTERNAL_URL;
    if (renderExternalUrl) {
      const webhookUrl = `${renderExternalUrl}/api/telegram`;
      await bot.telegram.setWebhook(webhookUrl);
      logger.log(`Webhook configurado en: ${webhookUrl}`);
    } else {
      logger.warn('RENDER_EXTERNAL_URL no definido: webhook sin registrar');
    }
  } else if (bot) {
    telegramService.startPolling();
  }

  const port = process.env.PORT || 3000;
  await app.listen(port);
  logger.log(`Servicio de clima escuchando en el puerto ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? (error.stack ?? error.message) : String(error),
  );
  process.exit(1);
});
