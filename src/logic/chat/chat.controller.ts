import { Body, Controller, Delete, Get, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ConversationService } from '../conversation/conversation.service';
import { ConversationSession } from '../conversation/conversation-session';
import { ChatMessageDto, HistoryQueryDto } from './dto/chat.dto';

@Controller('chat')
export class ChatController {

    constructor(
        private readonly chatService: ChatService,
        private readonly conversationService: ConversationService,
    ) {}

    @Post()
    async chat(@Body() body: ChatMessageDto) {
        const session = body.sessionId ? this.existing(body.sessionId) : this.conversationService.open();
        const turn = await this.chatService.handle(session, body.message, { speak: body.speak });
        return { sessionId: session.id, turn };
    }

    @Get('sessions/:id/history')
    getHistory(@Param('id') id: string, @Query() query: HistoryQueryDto) {
        const session = this.existing(id);
        return { sessionId: id, turns: session.recent(query.limit ?? session.capacity) };
    }

    @Delete('sessions/:id')
    closeSession(@Param('id') id: string) {
        if (!this.conversationService.close(id)) {
            throw new NotFoundException(`Session ${id} not found`);
        }
        return { sessionId: id, closed: true };
    }

    private existing(id: string): ConversationSession {
        const session = this.conversationService.get(id);
        if (!session) {
            throw new NotFoundException(`Session ${id} not found`);
        }
        return session;
    }
}
