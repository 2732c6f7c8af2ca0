import { clip, normalizeUtterance, tokenize } from './textNormalizer';

describe('textNormalizer', () => {
  it('collapses whitespace and drops trailing punctuation', () => {
    expect(normalizeUtterance("  What’s   the weather\tin Tokyo?? ")).toBe("What's the weather in Tokyo");
  });

  it('strips punctuation at token edges only', () => {
    expect(tokenize('"aapl." coca-cola, (j&j)')).toEqual(['aapl', 'coca-cola', 'j&j']);
  });

  it('clips long text with an ellipsis', () => {
    expect(clip('abcdef', 4)).toBe('abc…');
    expect(clip('abc', 4)).toBe('abc');
  });
});
