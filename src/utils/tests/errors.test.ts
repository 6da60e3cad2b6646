import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import {
  IllegalActionError,
  InvalidConfigurationError,
  ShoeEmptyError,
  isSimulationError,
  normalizeError,
} from '../errors.js';

describe('errors', () => {
  it('carries stable codes', () => {
    expect(new ShoeEmptyError(312).code).toBe('ERR_SHOE_EMPTY');
    expect(new ShoeEmptyError(312).message).toBe('Shoe of 312 cards is empty');
    const illegal = new IllegalActionError('random', 'split', 'stand');
    expect(illegal.code).toBe('ERR_ILLEGAL_ACTION');
    expect(illegal.message).toBe('Strategy "random" proposed illegal action "split", applied "stand"');
    expect(isSimulationError(illegal)).toBe(true);
    expect(isSimulationError(new Error('x'))).toBe(false);
  });

  it('builds a configuration error from zod issues', () => {
    const res = z.object({ decks: z.number().min(1, 'too few') }).safeParse({ decks: 0 });
    if (res.success) throw new Error('expected a failure');
    const err = InvalidConfigurationError.fromZod(res.error, 'options');
    expect(err.message).toBe('Invalid options: decks: too few');
    expect(err.issues).toEqual(['decks: too few']);
    expect(err.code).toBe('ERR_INVALID_CONFIG');
  });

  it('normalizes anything thrown', () => {
    const n = normalizeError(new InvalidConfigurationError('bad'));
    expect(n.name).toBe('InvalidConfigurationError');
    expect(n.code).toBe('ERR_INVALID_CONFIG');
    expect(normalizeError('boom')).toEqual({ name: 'string', message: 'boom', code: undefined, stack: '' });
  });
});
