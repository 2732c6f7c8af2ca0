import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SocketGateway } from './socket.gateway';
import { ChatService } from '../chat/chat.service';
import { ConversationService } from '../conversation/conversation.service';
import { ConversationSession } from '../conversation/conversation-session';
import { Intent, createUtterance } from '../../utils/types';

describe('SocketGateway', () => {
  let gateway: SocketGateway;
  let conversations: ConversationService;
  const client = { id: 'sock-1', emit: jest.fn() };
  const chat = { handle: jest.fn(), handleVoice: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    chat.handle.mockImplementation(async (session: ConversationSession, text: string) =>
      session.record({ utterance: createUtterance(text), intent: Intent.Unknown, text: `echo ${text}` }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SocketGateway,
        ConversationService,
        { provide: ConfigService, useValue: new ConfigService({ SESSION_CAPACITY: 10 }) },
        { provide: ChatService, useValue: chat },
      ],
    }).compile();

    gateway = module.get<SocketGateway>(SocketGateway);
    conversations = module.get<ConversationService>(ConversationService);
    gateway.handleConnection(client);
  });

  it('opens a session per socket and acknowledges the connection', () => {
    expect(conversations.get('sock-1')).toBeDefined();
    expect(client.emit).toHaveBeenCalledWith('connection:ack', { socketId: 'sock-1', sessionId: 'sock-1' });
  });

  it('replies to a user message with a bot message', async () => {
    await gateway.onUserMessage(client, { message: 'hello', speak: false });

    expect(chat.handle).toHaveBeenCalledWith(conversations.get('sock-1'), 'hello', { speak: false });
    expect(client.emit).toHaveBeenLastCalledWith('bot_message', {
      message: 'echo hello',
      intent: Intent.Unknown,
      seq: 1,
    });
  });

  it('rejects an invalid payload with an error event', async () => {
    await gateway.onUserMessage(client, { message: 42 });

    expect(chat.handle).not.toHaveBeenCalled();
    expect(client.emit).toHaveBeenLastCalledWith('error', {
      event: 'user_message',
      message: 'message: Expected string, received number',
    });
  });

  it('sends the apology when a voice message is not understood', async () => {
    chat.handleVoice.mockResolvedValue({ ok: false, reason: 'no_speech', text: "Sorry, I didn't catch that. Could you say it again?" });

    await gateway.onVoiceMessage(client, { audioData: 'YWJj', audioFormat: 'wav' });

    expect(chat.handleVoice).toHaveBeenCalledWith(conversations.get('sock-1'), Buffer.from('abc'), {
      language: undefined,
      format: 'wav',
      speak: undefined,
    });
    expect(client.emit).toHaveBeenLastCalledWith('bot_message', { message: "Sorry, I didn't catch that. Could you say it again?" });
  });

  it('returns the recent turns on request', async () => {
    await gateway.onUserMessage(client, { message: 'one' });
    await gateway.onUserMessage(client, { message: 'two' });

    gateway.onHistory(client, { limit: 1 });

    const [event, payload] = client.emit.mock.calls[client.emit.mock.calls.length - 1];
    expect(event).toBe('history');
    expect(payload.turns.map((turn: { text: string }) => turn.text)).toEqual(['echo two']);
  });

  it('closes the session on disconnect', () => {
    gateway.handleDisconnect(client);

    expect(conversations.get('sock-1')).toBeUndefined();
  });
});
