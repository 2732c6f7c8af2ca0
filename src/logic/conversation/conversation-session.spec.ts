import { ConversationSession } from './conversation-session';
import { Intent, TurnDraft, createUtterance } from '../../utils/types';

function draft(text: string): TurnDraft {
  return { utterance: createUtterance(text), intent: Intent.Unknown, text: `reply to ${text}` };
}

describe('ConversationSession', () => {
  it('assigns increasing sequence numbers', () => {
    const session = new ConversationSession('s1', 5);
    const first = session.record(draft('one'));
    const second = session.record(draft('two'));

    expect(first.seq).toBe(1);
    expect(second.seq).toBe(2);
    expect(session.size).toBe(2);
  });

  it('freezes recorded turns', () => {
    const session = new ConversationSession('s1', 5);
    const turn = session.record(draft('one'));

    expect(Object.isFrozen(turn)).toBe(true);
    expect(Object.isFrozen(turn.utterance)).toBe(true);
  });

  it('evicts the oldest turns beyond capacity', () => {
    const session = new ConversationSession('s1', 3);
    for (const text of ['a', 'b', 'c', 'd', 'e']) {
      session.record(draft(text));
    }

    expect(session.size).toBe(3);
    expect(session.recent(10).map(turn => turn.utterance.text)).toEqual(['c', 'd', 'e']);
    expect(session.recent(10).map(turn => turn.seq)).toEqual([3, 4, 5]);
  });

  it('returns the last n turns in insertion order', () => {
    const session = new ConversationSession('s1', 10);
    for (const text of ['a', 'b', 'c']) {
      session.record(draft(text));
    }

    expect(session.recent(2).map(turn => turn.utterance.text)).toEqual(['b', 'c']);
    expect(session.recent(0)).toEqual([]);
    expect(session.recent(-1)).toEqual([]);
  });

  it('rejects a capacity below one', () => {
    expect(() => new ConversationSession('s1', 0)).toThrow(RangeError);
  });
});
