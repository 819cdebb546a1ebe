import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Context } from 'telegraf';
import {
  CLIMA_USAGE,
  COMPARAR_USAGE,
  TelegramService,
} from './telegram.service';
import { WeatherToolsService } from '../weather/weather-tools.service';

function fakeContext() {
  const reply = jest.fn().mockResolvedValue(undefined);
  const sendChatAction = jest.fn().mockResolvedValue(true);
  const ctx = { reply, sendChatAction } as unknown as Context;
  return { ctx, reply, sendChatAction };
}

describe('TelegramService', () => {
  let weatherTools: { getWeather: jest.Mock; compareWeather: jest.Mock };
  let botToken: string | undefined;

  async function createService() {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TelegramService,
        { provide: WeatherToolsService, useValue: weatherTools },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'BOT_TOKEN' ? botToken : undefined,
            ),
          },
        },
      ],
    }).compile();

    return module.get<TelegramService>(TelegramService);
  }

  beforeEach(() => {
    botToken = 'test-token';
    weatherTools = {
      getWeather: jest.fn().mockResolvedValue({
        city: 'Lima',
        temperature: '19°C',
        condition: 'Mist',
        humidityPercent: '88%',
        wind: '6 km/h',
      }),
      compareWeather: jest.fn().mockResolvedValue({
        metric: 'wind',
        cities: [],
      }),
    };
  });

  it('stays disabled without a bot token', async () => {
    botToken = undefined;
    const service = await createService();

    expect(service.getBot()).toBeUndefined();
    await expect(service.getWebhookMiddleware()).resolves.toBeUndefined();
  });

  it('creates the bot when a token is configured', async () => {
    const service = await createService();

    expect(service.getBot()).toBeDefined();
  });

  it('logs instead of throwing when stopped before polling connects', async () => {
    const service = await createService();
    const bot = service.getBot();
    if (!bot) throw new Error('Expected the bot to be configured');
    jest.spyOn(bot, 'launch').mockReturnValue(new Promise<void>(() => {}));
    const stop = jest.spyOn(bot, 'stop').mockImplementation(() => {
      throw new Error('Bot is not running!');
    });

    service.startPolling();

    expect(() => service.onModuleDestroy()).not.toThrow();
    expect(stop).toHaveBeenCalledWith('shutdown');

    service.onModuleDestroy();
    expect(stop).toHaveBeenCalledTimes(1);
  });

  describe('handleClima', () => {
    it('replies with usage when no city is given', async () => {
      const service = await createService();
      const { ctx, reply } = fakeContext();

      await service.handleClima(ctx, '   ');

      expect(reply).toHaveBeenCalledWith(CLIMA_USAGE);
      expect(weatherTools.getWeather).not.toHaveBeenCalled();
    });

    it('renders the lookup result', async () => {
      const service = await createService();
      const { ctx, reply, sendChatAction } = fakeContext();

      await service.handleClima(ctx, 'Lima detalle');

      expect(sendChatAction).toHaveBeenCalledWith('typing');
      expect(weatherTools.getWeather).toHaveBeenCalledWith(
        'Lima',
        'metric',
        true,
      );
      expect(reply).toHaveBeenCalledWith(
        [
          '🌤 *Lima*',
          '🌡 Temperatura: 19°C',
          '☁️ Condición: Mist',
          '💧 Humedad: 88%',
          '💨 Viento: 6 km/h',
        ].join('\n'),
        { parse_mode: 'MarkdownV2' },
      );
    });

    it('apologizes when the reply cannot be built', async () => {
      weatherTools.getWeather.mockRejectedValue(new Error('boom'));
      const service = await createService();
      const { ctx, reply } = fakeContext();

      await service.handleClima(ctx, 'Lima');

      expect(reply).toHaveBeenLastCalledWith(
        'Lo siento, no pude consultar el clima en este momento.',
      );
    });
  });

  describe('handleComparar', () => {
    it('replies with usage when no cities are given', async () => {
      const service = await createService();
      const { ctx, reply } = fakeContext();

      await service.handleComparar(ctx, 'viento');

      expect(reply).toHaveBeenCalledWith(COMPARAR_USAGE);
      expect(weatherTools.compareWeather).not.toHaveBeenCalled();
    });

    it('passes the parsed cities and metric', async () => {
      const service = await createService();
      const { ctx, reply } = fakeContext();

      await service.handleComparar(ctx, 'Lima, Quito viento');

      expect(weatherTools.compareWeather).toHaveBeenCalledWith(
        ['Lima', 'Quito'],
        'wind',
      );
      expect(reply).toHaveBeenCalledWith(
        '📊 *Comparación por viento*\n' +
          'No se pudo obtener el clima de ninguna ciudad\\.',
        { parse_mode: 'MarkdownV2' },
      );
    });
  });
});
