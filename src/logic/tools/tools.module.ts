import { Module } from '@nestjs/common';
import { ToolsController } from './tools.controller';
import { ToolsService } from './tools.service';
import { WeatherModule } from '../weather/weather.module';
import { StockModule } from '../stock/stock.module';
import { NewsModule } from '../news/news.module';

@Module({
  imports: [
    WeatherModule,
    StockModule,
    NewsModule,
  ],
  controllers: [ToolsController],
  providers: [ToolsService],
  exports: [ToolsService],
})
export class ToolsModule {}
