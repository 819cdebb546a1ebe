import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { WeatherService } from './weather.service';
import { WeatherComparisonService } from './weather-comparison.service';
import { WeatherToolsService } from './weather-tools.service';
import { WeatherController } from './weather.controller';

@Module({
  imports: [HttpModule, ConfigModule],
  controllers: [WeatherController],
  providers: [WeatherService, WeatherComparisonService, WeatherToolsService],
  exports: [WeatherToolsService],
})
export class WeatherModule {}
