import { scrubMessage, scrubPII } from '../../../src/util/redact.js';

describe('Redact', () => {
  it('scrubs dates, months, amounts and places from messages', () => {
    expect(scrubMessage('trip 2025-03-17 to 2025-03-19', true)).toBe('trip [REDACTED_DATES]');
    expect(scrubMessage('leaving on 2025-03-17', true)).toBe('leaving on [REDACTED_DATE]');
    expect(scrubMessage('sometime in March', true)).toBe('sometime in [REDACTED_MONTH]');
    expect(scrubMessage('early March', true)).toBe('early [REDACTED_MONTH]');
    expect(scrubMessage('budget 20000', true)).toBe('budget [REDACTED_AMOUNT]');
    expect(scrubMessage('about $1500 total', true)).toBe('about [REDACTED_AMOUNT] total');
    expect(scrubMessage('fly to Chiang Mai', true)).toBe('fly to [REDACTED_CITY]');
  });

  it('leaves messages alone when disabled', () => {
    const message = 'fly to Phuket on 2025-03-17';
    expect(scrubMessage(message, false)).toBe(message);
  });

  it('replaces sensitive slot values in objects', () => {
    const scrubbed = scrubPII(
      { destination: 'Phuket', budget: 20000, slots: { start_date: '2025-03-17' }, note: 'from Bangkok', count: 3 },
      true,
    );
    expect(scrubbed).toEqual({
      destination: '[REDACTED]',
      budget: '[REDACTED]',
      slots: { start_date: '[REDACTED]' },
      note: 'from [REDACTED_CITY]',
      count: 3,
    });
  });

  it('reduces errors to their scrubbed name and message', () => {
    expect(scrubPII(new Error('no flights to Krabi'), true)).toEqual({
      name: 'Error',
      message: 'no flights to [REDACTED_CITY]',
    });
  });

  it('returns the same object when disabled', () => {
    const obj = { destination: 'Phuket' };
    expect(scrubPII(obj, false)).toBe(obj);
  });

  it('handles cycles', () => {
    const obj: Record<string, unknown> = { text: 'hello' };
    obj.self = obj;
    expect(scrubPII(obj, true)).toEqual({ text: '[REDACTED]', self: obj });
  });
});
