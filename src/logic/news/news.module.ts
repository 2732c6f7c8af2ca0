import { Module } from '@nestjs/common';
import { NewsService } from './news.service';

@Module({
    exports: [NewsService],
    providers: [NewsService],
})
export class NewsModule {}
