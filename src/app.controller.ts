import { Controller, Get } from '@nestjs/common';
import { WEATHER_TOOLS } from './weather/weather-tools.service';

export const SERVICE_NAME = 'clima-bot';
export const SERVICE_VERSION = '0.1.0';

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  server: string;
  version: string;
  toolsAvailable: string[];
}

@Controller()
export class AppController {
  // Usado por el monitor de disponibilidad del hosting
  @Get('ping')
  ping() {
    return { message: 'pong' };
  }

  @Get('health')
  health(): HealthStatus {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      server: SERVICE_NAME,
      version: SERVICE_VERSION,
      toolsAvailable: [...WEATHER_TOOLS],
    };
  }
}
