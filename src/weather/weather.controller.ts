import { Controller, Get, Query } from '@nestjs/common';
import { WeatherToolsService } from './weather-tools.service';
import {
  ComparisonResult,
  WeatherFailure,
  WeatherResult,
} from './interfaces/weather.interface';

// Los errores de validación y del proveedor viajan en el cuerpo como `{ error }`
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherTools: WeatherToolsService) {}

  @Get()
  getWeather(
    @Query('city') city?: string,
    @Query('units') units?: string,
    @Query('detailed') detailed?: string,
  ): Promise<WeatherResult> {
    return this.weatherTools.getWeather(city, units, detailed);
  }

  @Get('compare')
  compareWeather(
    @Query('cities') cities?: string | string[],
    @Query('metric') metric?: string,
  ): Promise<ComparisonResult | WeatherFailure> {
    return this.weatherTools.compareWeather(cities, metric);
  }
}
