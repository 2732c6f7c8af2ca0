import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { ConversationSession, DEFAULT_SESSION_CAPACITY } from './conversation-session';

export const DEFAULT_MAX_SESSIONS = 1000;

/**
 * In-memory session registry. Holds at most `MAX_SESSIONS` sessions; opening
 * one past the limit evicts the session that was used least recently.
 */
@Injectable()
export class ConversationService {
    private readonly logger = new Logger(ConversationService.name);
    // Insertion order is recency order: a used session is moved to the end.
    private readonly sessions = new Map<string, ConversationSession>();
    private readonly capacity: number;
    private readonly maxSessions: number;

    constructor(private readonly configService: ConfigService) {
        this.capacity = this.configService.get<number>('SESSION_CAPACITY') ?? DEFAULT_SESSION_CAPACITY;
        this.maxSessions = this.configService.get<number>('MAX_SESSIONS') ?? DEFAULT_MAX_SESSIONS;
    }

    /** Opens a session under `key`, or under a fresh uuid. An existing session is returned as is. */
    open(key: string = uuidv4()): ConversationSession {
        const existing = this.get(key);
        if (existing) {
            return existing;
        }
        const session = new ConversationSession(key, this.capacity);
        this.sessions.set(key, session);
        this.logger.log(`Opened session ${key}`);
        this.evictOverflow();
        return session;
    }

    get(key: string): ConversationSession | undefined {
        const session = this.sessions.get(key);
        if (session) {
            this.sessions.delete(key);
            this.sessions.set(key, session);
        }
        return session;
    }

    close(key: string): boolean {
        const closed = this.sessions.delete(key);
        if (closed) {
            this.logger.log(`Closed session ${key}`);
        }
        return closed;
    }

    get openCount(): number {
        return this.sessions.size;
    }

    private evictOverflow() {
        for (const key of this.sessions.keys()) {
            if (this.sessions.size <= this.maxSessions) {
                return;
            }
            this.sessions.delete(key);
            this.logger.warn(`Evicted idle session ${key}: more than ${this.maxSessions} sessions open`);
        }
    }
}
