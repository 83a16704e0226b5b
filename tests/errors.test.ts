import { describe, expect, it } from 'vitest';
import { ConversionError, describeError, invalidInput, toConversionError } from '../src/flatten/errors.js';

describe('ConversionError', () => {
  it('labels invalid input with its reason', () => {
    expect(invalidInput('Encrypted', 'locked').label).toBe('InvalidInput:Encrypted');
    expect(new ConversionError('RenderError', 'bad page').label).toBe('RenderError');
  });

  it('keeps the cause', () => {
    const cause = new Error('disk full');
    const error = new ConversionError('IOError', 'write failed', { cause });
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('ConversionError');
  });
});

describe('toConversionError', () => {
  it('passes conversion errors through', () => {
    const original = new ConversionError('EncodeError', 'codec');
    expect(toConversionError(original, 'IOError')).toBe(original);
  });

  it('wraps anything else with the fallback kind', () => {
    const wrapped = toConversionError('plain string', 'RenderError', 3);
    expect(wrapped.kind).toBe('RenderError');
    expect(wrapped.message).toBe('plain string');
    expect(wrapped.pageIndex).toBe(3);
  });
});

describe('describeError', () => {
  it('omits absent fields', () => {
    expect(describeError(new ConversionError('UsageError', 'twice'))).toEqual({
      kind: 'UsageError',
      message: 'twice',
    });
  });

  it('includes reason and page index when set', () => {
    const error = new ConversionError('InvalidInput', 'short', { reason: 'TooSmall', pageIndex: 0 });
    expect(describeError(error)).toEqual({ kind: 'InvalidInput', reason: 'TooSmall', message: 'short', pageIndex: 0 });
  });
});
