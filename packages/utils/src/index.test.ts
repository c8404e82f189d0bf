import { describe, it, expect } from 'vitest';
import { stringifyJSONSafe } from './index.js';

describe('stringifyJSONSafe', () => {
  it('should stringify plain values', () => {
    expect(stringifyJSONSafe({ path: '/var', bytes: 42 })).toBe('{"path":"/var","bytes":42}');
    expect(stringifyJSONSafe('reason')).toBe('"reason"');
  });

  it('should return undefined for circular structures', () => {
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;

    expect(stringifyJSONSafe(circular)).toBeUndefined();
  });

  it('should return undefined for bigint values', () => {
    expect(stringifyJSONSafe({ bytes: 10n })).toBeUndefined();
  });
});
