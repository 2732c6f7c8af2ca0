import { BadRequestException, Body, Controller, Post } from '@nestjs/common';
import { ToolsService } from './tools.service';
import * as executeToolDto from './dto/execute-tool.dto';

@Controller('tools')
export class ToolsController {
  constructor(private readonly toolsService: ToolsService) {}

  @Post('execute')
  async execute(@Body() body: executeToolDto.ExecuteToolDto) {
    switch (body.tool) {
      case executeToolDto.ToolActionType.GET_WEATHER:
        return this.toolsService.getWeather(body.input);
      case executeToolDto.ToolActionType.GET_FORECAST:
        return this.toolsService.getForecast(body.input, body.days);
      case executeToolDto.ToolActionType.GET_STOCK_QUOTE:
        return this.toolsService.getStockQuote(body.input);
      case executeToolDto.ToolActionType.SEARCH_STOCKS:
        return this.toolsService.searchStocks(body.input);
      case executeToolDto.ToolActionType.GET_HEADLINES:
        return this.toolsService.getHeadlines(body.input, body.country);
      case executeToolDto.ToolActionType.SEARCH_NEWS:
        return this.toolsService.searchNews(body.input);
      case executeToolDto.ToolActionType.LIST_NEWS_CATEGORIES:
        return this.toolsService.listNewsCategories();
      case executeToolDto.ToolActionType.LIST_NEWS_COUNTRIES:
        return this.toolsService.listNewsCountries();
      default:
        throw new BadRequestException('Unknown tool action');
    }
  }
}
