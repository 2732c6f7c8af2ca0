import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString, Length, Max, MaxLength, Min } from 'class-validator';

export enum ToolActionType {
  GET_WEATHER = 'GET_WEATHER',
  GET_FORECAST = 'GET_FORECAST',
  GET_STOCK_QUOTE = 'GET_STOCK_QUOTE',
  SEARCH_STOCKS = 'SEARCH_STOCKS',
  GET_HEADLINES = 'GET_HEADLINES',
  SEARCH_NEWS = 'SEARCH_NEWS',
  LIST_NEWS_CATEGORIES = 'LIST_NEWS_CATEGORIES',
  LIST_NEWS_COUNTRIES = 'LIST_NEWS_COUNTRIES',
}

export class ExecuteToolDto {
  @IsEnum(ToolActionType)
  tool!: ToolActionType;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  input?: string;

  @IsOptional()
  @IsString()
  @Length(2, 2)
  country?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(5)
  days?: number;
}
