import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConversationService } from './conversation.service';

describe('ConversationService', () => {
  let service: ConversationService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversationService,
        { provide: ConfigService, useValue: new ConfigService({ SESSION_CAPACITY: 4 }) },
      ],
    }).compile();

    service = module.get<ConversationService>(ConversationService);
  });

  it('opens sessions with the configured capacity', () => {
    const session = service.open('socket-1');

    expect(session.id).toBe('socket-1');
    expect(session.capacity).toBe(4);
    expect(service.get('socket-1')).toBe(session);
  });

  it('generates a uuid key when none is given', () => {
    const session = service.open();

    expect(session.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('returns the existing session for a known key', () => {
    expect(service.open('k')).toBe(service.open('k'));
    expect(service.openCount).toBe(1);
  });

  it('closes sessions', () => {
    service.open('k');

    expect(service.close('k')).toBe(true);
    expect(service.get('k')).toBeUndefined();
    expect(service.close('k')).toBe(false);
  });

  describe('with a session limit', () => {
    let bounded: ConversationService;

    beforeEach(async () => {
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          ConversationService,
          { provide: ConfigService, useValue: new ConfigService({ SESSION_CAPACITY: 4, MAX_SESSIONS: 3 }) },
        ],
      }).compile();

      bounded = module.get<ConversationService>(ConversationService);
    });

    it('evicts the least recently used session past the limit', () => {
      bounded.open('a');
      bounded.open('b');
      bounded.open('c');
      bounded.get('a');
      bounded.open('d');

      expect(bounded.openCount).toBe(3);
      expect(bounded.get('b')).toBeUndefined();
      expect(bounded.get('a')).toBeDefined();
      expect(bounded.get('c')).toBeDefined();
      expect(bounded.get('d')).toBeDefined();
    });

    it('never holds more sessions than the limit', () => {
      for (let i = 0; i < 100; i++) {
        bounded.open();
      }

      expect(bounded.openCount).toBe(3);
    });
  });
});
