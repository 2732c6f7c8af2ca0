import { BadRequestException, Injectable } from '@nestjs/common';
import { WeatherService } from '../weather/weather.service';
import { StockService } from '../stock/stock.service';
import { NewsService, asCategory } from '../news/news.service';
import { MAX_FORECAST_DAYS } from '../intent-router/intent-router.service';

/**
 * Direct access to a single provider call, bypassing the intent router.
 * Provider failures come back as `{ ok: false, reason }` results, not errors.
 */
@Injectable()
export class ToolsService {
  constructor(
    private readonly weatherService: WeatherService,
    private readonly stockService: StockService,
    private readonly newsService: NewsService,
  ) {}

  async getWeather(city?: string) {
    return this.weatherService.fetch(this.required(city, 'city'));
  }

  async getForecast(city?: string, days = MAX_FORECAST_DAYS) {
    return this.weatherService.fetchForecast(this.required(city, 'city'), days);
  }

  async getStockQuote(symbol?: string) {
    return this.stockService.fetch(this.required(symbol, 'ticker symbol'));
  }

  async searchStocks(keywords?: string) {
    return this.stockService.search(this.required(keywords, 'search keywords'));
  }

  async getHeadlines(category?: string, country?: string) {
    const topic = category?.trim();
    const matched = topic ? asCategory(topic) : undefined;
    if (topic && !matched) {
      throw new BadRequestException(`Unknown news category "${topic}"`);
    }
    return this.newsService.topHeadlines(country, matched);
  }

  async searchNews(query?: string) {
    return this.newsService.search(this.required(query, 'search query'));
  }

  listNewsCategories() {
    return { categories: this.newsService.categories() };
  }

  listNewsCountries() {
    return { countries: this.newsService.countries() };
  }

  private required(value: string | undefined, label: string): string {
    const trimmed = value?.trim();
    if (!trimmed) {
      throw new BadRequestException(`This tool requires a ${label} as input`);
    }
    return trimmed;
  }
}
