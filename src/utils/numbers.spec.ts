import { round1 } from './numbers';

describe('round1', () => {
  it('rounds to one decimal place', () => {
    expect(round1(21.46)).toBe(21.5);
    expect(round1(-3.04)).toBe(-3);
    expect(round1(7)).toBe(7);
  });
});
