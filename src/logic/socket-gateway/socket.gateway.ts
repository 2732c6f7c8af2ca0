import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { ChatService } from '../chat/chat.service';
import { ConversationService } from '../conversation/conversation.service';
import { ConversationSession } from '../conversation/conversation-session';
import { AUDIO_INPUT_FORMATS, Transcript } from '../speech/speech.types';
import { Turn } from '../../utils/types';

const userMessageSchema = z.object({
  message: z.string().max(1000),
  speak: z.boolean().optional(),
});

const voiceMessageSchema = z.object({
  audioData: z.string().min(1),
  language: z.string().optional(),
  audioFormat: z.enum(AUDIO_INPUT_FORMATS).optional(),
  speak: z.boolean().optional(),
});

const historySchema = z
  .object({ limit: z.number().int().min(0).optional() })
  .optional();

/** The parts of a socket.io connection the gateway uses. */
export type ClientSocket = Pick<Socket, 'id' | 'emit'>;

export interface BotMessage {
  message: string;
  intent?: Turn['intent'];
  entity?: string;
  audio?: Turn['audio'];
  transcript?: string;
  seq?: number;
}

function botMessage(turn: Turn, transcript?: Transcript): BotMessage {
  return {
    message: turn.text,
    intent: turn.intent,
    entity: turn.entity?.value,
    audio: turn.audio,
    transcript: transcript?.transcript,
    seq: turn.seq,
  };
}

// CORS for this gateway is applied by the socket adapter configured in main.ts.
@WebSocketGateway()
@Injectable()
export class SocketGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SocketGateway.name);

  constructor(
    private readonly chatService: ChatService,
    private readonly conversationService: ConversationService,
  ) {}

  handleConnection(client: ClientSocket) {
    const session = this.conversationService.open(client.id);
    this.logger.log(`Client ${client.id} connected`);

    client.emit('connection:ack', {
      socketId: client.id,
      sessionId: session.id,
    });
  }

  handleDisconnect(client: ClientSocket) {
    this.conversationService.close(client.id);
    this.logger.log(`Client ${client.id} disconnected`);
  }

  @SubscribeMessage('user_message')
  async onUserMessage(@ConnectedSocket() client: ClientSocket, @MessageBody() body: unknown) {
    const parsed = userMessageSchema.safeParse(body);
    if (!parsed.success) {
      return this.rejectPayload(client, 'user_message', parsed.error);
    }

    const turn = await this.chatService.handle(this.sessionFor(client), parsed.data.message, {
      speak: parsed.data.speak,
    });
    client.emit('bot_message', botMessage(turn));
  }

  @SubscribeMessage('voice_message')
  async onVoiceMessage(@ConnectedSocket() client: ClientSocket, @MessageBody() body: unknown) {
    const parsed = voiceMessageSchema.safeParse(body);
    if (!parsed.success) {
      return this.rejectPayload(client, 'voice_message', parsed.error);
    }

    const { audioData, language, audioFormat, speak } = parsed.data;
    const reply = await this.chatService.handleVoice(this.sessionFor(client), Buffer.from(audioData, 'base64'), {
      language,
      format: audioFormat,
      speak,
    });

    if (!reply.ok) {
      const apology: BotMessage = { message: reply.text };
      client.emit('bot_message', apology);
      return;
    }
    client.emit('bot_message', botMessage(reply.turn, reply.transcript));
  }

  @SubscribeMessage('history')
  onHistory(@ConnectedSocket() client: ClientSocket, @MessageBody() body: unknown) {
    const parsed = historySchema.safeParse(body);
    if (!parsed.success) {
      return this.rejectPayload(client, 'history', parsed.error);
    }

    const session = this.sessionFor(client);
    const limit = parsed.data?.limit ?? session.capacity;
    client.emit('history', { turns: session.recent(limit) });
  }

  private sessionFor(client: ClientSocket): ConversationSession {
    return this.conversationService.get(client.id) ?? this.conversationService.open(client.id);
  }

  private rejectPayload(client: ClientSocket, event: string, error: z.ZodError) {
    const message = error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');
    this.logger.warn(`Rejected ${event} from ${client.id}: ${message}`);
    client.emit('error', { event, message });
  }
}
