import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Context, Markup, Telegraf } from 'telegraf';
import { WeatherToolsService } from '../weather/weather-tools.service';
import { escapeMarkdownV2, formatCommandUsage } from '../utils/telegram-format';
import {
  buildComparisonMessage,
  buildWeatherMessage,
  parseClimaArgs,
  parseCompararArgs,
} from './weather-message';

export const CLIMA_USAGE = formatCommandUsage(
  'clima',
  '<ciudad> [imperial] [detalle]',
);
export const COMPARAR_USAGE = formatCommandUsage(
  'comparar',
  '<ciudad1>, <ciudad2>[, ...] [temperatura|humedad|viento]',
);

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly bot?: Telegraf;
  private readonly logger = new Logger(TelegramService.name);
  private polling = false;

  constructor(
    private readonly weatherTools: WeatherToolsService,
    configService: ConfigService,
  ) {
    const token = configService.get<string>('BOT_TOKEN');
    if (!token) {
      this.logger.warn(
        'BOT_TOKEN no definido: el bot de Telegram queda desactivado',
      );
      return;
    }
    this.bot = new Telegraf(token);
  }

  onModuleInit() {
    if (!this.bot) return;
    this.setupCommands(this.bot);
    this.logger.log(
      'Servicio de Telegram inicializado y comandos configurados.',
    );
  }

  onModuleDestroy() {
    if (!this.bot || !this.polling) return;
    this.polling = false;
    try {
      this.bot.stop('shutdown');
    } catch (error) {
      // launch() todavía no había terminado de conectar
      this.logger.error(
        `Error al detener el bot de Telegram: ${describeError(error)}`,
      );
    }
  }

  getBot(): Telegraf | undefined {
    return this.bot;
  }

  async getWebhookMiddleware() {
    return this.bot?.webhookCallback('/api/telegram');
  }

  /**
   * Long polling para desarrollo; en producción se usa el webhook.
   */
  startPolling() {
    if (!this.bot || this.polling) return;
    this.polling = true;
    this.bot.launch().catch((error: unknown) => {
      this.polling = false;
      this.logger.error(
        `Error en el long polling de Telegram: ${describeError(error)}`,
      );
    });
  }

  private setupCommands(bot: Telegraf) {
    bot.start((ctx) => this.sendIntroduction(ctx));
    bot.command('ayuda', (ctx) => this.sendIntroduction(ctx));

    bot.command('clima', (ctx) => this.handleClima(ctx, ctx.payload));
    bot.command('comparar', (ctx) => this.handleComparar(ctx, ctx.payload));

    bot.hears(/^clima en (.+)$/i, (ctx) => this.handleClima(ctx, ctx.match[1]));
    bot.hears(/^comparar (.+)$/i, (ctx) =>
      this.handleComparar(ctx, ctx.match[1]),
    );

    bot.action('show_clima_help', async (ctx) => {
      await ctx.answerCbQuery();
      await ctx.reply(CLIMA_USAGE);
    });
    bot.action('show_comparar_help', async (ctx) => {
      await ctx.answerCbQuery();
      await ctx.reply(COMPARAR_USAGE);
    });

    bot.catch((error, ctx) => {
      this.logger.error(
        `Error no controlado en la actualización ${ctx.update.update_id}: ${describeError(error)}`,
      );
    });
  }

  async handleClima(ctx: Context, payload: string) {
    const args = parseClimaArgs(payload);
    if (!args.city) {
      await ctx.reply(CLIMA_USAGE);
      return;
    }

    try {
      await ctx.sendChatAction('typing');
      const result = await this.weatherTools.getWeather(
        args.city,
        args.units,
        args.detailed,
      );
      await ctx.reply(buildWeatherMessage(result), {
        parse_mode: 'MarkdownV2',
      });
    } catch (error) {
      this.logger.error(
        `Error al responder /clima para ${args.city}: ${describeError(error)}`,
      );
      await ctx.reply('Lo siento, no pude consultar el clima en este momento.');
    }
  }

  async handleComparar(ctx: Context, payload: string) {
    const args = parseCompararArgs(payload);
    if (args.cities.length === 0) {
      await ctx.reply(COMPARAR_USAGE);
      return;
    }

    try {
      await ctx.sendChatAction('typing');
      const result = await this.weatherTools.compareWeather(
        args.cities,
        args.metric,
      );
      await ctx.reply(buildComparisonMessage(result), {
        parse_mode: 'MarkdownV2',
      });
    } catch (error) {
      this.logger.error(`Error al responder /comparar: ${describeError(error)}`);
      await ctx.reply(
        'Lo siento, no pude comparar las ciudades en este momento.',
      );
    }
  }

  private async sendIntroduction(ctx: Context) {
    const userName = ctx.from?.first_name || 'viajero';
    const message =
      `¡Hola, *${escapeMarkdownV2(userName)}*\\!\n\n` +
      `🌤 *Clima actual*\n` +
      escapeMarkdownV2(
        'Escribe "/clima Madrid" o "clima en Madrid". Añade "imperial" o ' +
          '"detalle" al final para cambiar unidades o ver 3 días.',
      ) +
      `\n\n📊 *Comparar ciudades*\n` +
      escapeMarkdownV2(
        'Escribe "/comparar Madrid, Lima, Quito humedad" (hasta 5 ciudades).',
      );

    await ctx.reply(message, {
      parse_mode: 'MarkdownV2',
      ...Markup.inlineKeyboard([
        [
          Markup.button.callback('🌤 Clima', 'show_clima_help'),
          Markup.button.callback('📊 Comparar', 'show_comparar_help'),
        ],
      ]),
    });
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
