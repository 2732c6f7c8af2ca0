import { Module } from '@nestjs/common';
import { ConversationService } from './conversation.service';

@Module({
    exports: [ConversationService],
    providers: [ConversationService],
})
export class ConversationModule {}
