import { Controller, Post, Body, HttpCode } from '@nestjs/common';
import { TelegramService } from './telegram.service';
import type { Update } from 'telegraf/types';

@Controller('telegram')
export class TelegramController {
  constructor(private readonly telegramService: TelegramService) {}

  @Post()
  @HttpCode(200)
  async handleUpdate(@Body() update: Update) {
    await this.telegramService.getBot()?.handleUpdate(update);
  }
}
