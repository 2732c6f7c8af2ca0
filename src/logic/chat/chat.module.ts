import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { IntentRouterModule } from '../intent-router/intent-router.module';
import { ResponseComposerModule } from '../response-composer/response-composer.module';
import { ConversationModule } from '../conversation/conversation.module';
import { WeatherModule } from '../weather/weather.module';
import { StockModule } from '../stock/stock.module';
import { NewsModule } from '../news/news.module';
import { SpeechModule } from '../speech/speech.module';

@Module({
    imports: [
        IntentRouterModule,
        ResponseComposerModule,
        ConversationModule,
        WeatherModule,
        StockModule,
        NewsModule,
        SpeechModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService, ConversationModule],
})
export class ChatModule {}
