import { Turn, TurnDraft } from '../../utils/types';

export const DEFAULT_SESSION_CAPACITY = 20;

/**
 * Bounded, append-only log of the turns exchanged on one connection.
 * `record` is synchronous, so appends from concurrent requests never
 * interleave: each gets the next `seq` in completion order.
 */
export class ConversationSession {
    private readonly turns: Turn[] = [];
    private nextSeq = 1;

    constructor(
        readonly id: string,
        readonly capacity = DEFAULT_SESSION_CAPACITY,
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Session capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.turns.length;
    }

    record(draft: TurnDraft): Turn {
        const turn: Turn = Object.freeze({ ...draft, seq: this.nextSeq++ });
        this.turns.push(turn);
        if (this.turns.length > this.capacity) {
            this.turns.splice(0, this.turns.length - this.capacity);
        }
        return turn;
    }

    recent(n: number): Turn[] {
        if (n <= 0) {
            return [];
        }
        return this.turns.slice(-n);
    }
}
