import { describe, expect, it } from 'vitest';
import { isNumericLike, isValidMessageId, readHistoryMessageId } from '../src/recall/identifier';

describe('message id validation', () => {
  it('accepts only non-empty all-digit string forms on the reference platform', () => {
    expect(isNumericLike('123456')).toBe(true);
    expect(isNumericLike(123456)).toBe(true);
    expect(isNumericLike(10n)).toBe(true);

    expect(isNumericLike('')).toBe(false);
    expect(isNumericLike('12a')).toBe(false);
    expect(isNumericLike(' 12')).toBe(false);
    expect(isNumericLike(-5)).toBe(false);
    expect(isNumericLike(1.5)).toBe(false);
    expect(isNumericLike(null)).toBe(false);
    expect(isNumericLike(undefined)).toBe(false);
    expect(isNumericLike(['1'])).toBe(false);
    expect(isNumericLike({})).toBe(false);
    expect(isNumericLike(Symbol('1'))).toBe(false);
  });

  it('never throws on values that cannot be stringified', () => {
    const hostile = {
      toString(): string {
        throw new Error('boom');
      },
    };

    expect(isNumericLike(hostile)).toBe(false);
    expect(isValidMessageId(hostile, 'max')).toBe(false);
  });

  it('uses a whitespace-free rule on other platforms', () => {
    expect(isValidMessageId('mid.0a1b', 'max')).toBe(true);
    expect(isValidMessageId('mid 1', 'max')).toBe(false);
    expect(isValidMessageId('', 'max')).toBe(false);
    expect(isValidMessageId('mid.0a1b', 'qq')).toBe(false);
    expect(isValidMessageId(42, 'max')).toBe(true);
    expect(isValidMessageId(true, 'max')).toBe(false);
    expect(isValidMessageId({ mid: 'mid.1' }, 'max')).toBe(false);
  });

  it('reads the first valid id field of a history record', () => {
    expect(readHistoryMessageId({ message_id: 'x1', msg_id: 42 }, 'qq')).toBe('42');
    expect(readHistoryMessageId({ id: '', msgId: '7' }, 'qq')).toBe('7');
    expect(readHistoryMessageId({ text: 'hello' }, 'qq')).toBeNull();
  });
});
