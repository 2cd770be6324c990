import { describe, it, expect } from 'vitest';
import { extractJsonObject } from './extract-json';

describe('extractJsonObject', () => {
  it('should prefer a fenced json block', () => {
    const text = 'Here is the plan {not json}\n```json\n{"goal": "x"}\n```\ndone';
    expect(extractJsonObject(text)).toEqual({ ok: true, value: { goal: 'x' } });
  });

  it('should find the first balanced object in plain output', () => {
    const text = 'thinking...\n{"a": {"b": 1}} trailing {"c": 2}';
    expect(extractJsonObject(text)).toEqual({ ok: true, value: { a: { b: 1 } } });
  });

  it('should ignore braces inside strings', () => {
    const text = '{"message": "use } and { freely", "n": 1}';
    expect(extractJsonObject(text)).toEqual({
      ok: true,
      value: { message: 'use } and { freely', n: 1 },
    });
  });

  it('should report output without an object', () => {
    expect(extractJsonObject('nothing here')).toEqual({
      ok: false,
      error: 'No JSON object found in output',
    });
  });

  it('should report an unbalanced object as missing', () => {
    expect(extractJsonObject('{"a": 1')).toEqual({ ok: false, error: 'No JSON object found in output' });
  });

  it('should report invalid JSON', () => {
    const result = extractJsonObject('{a: 1}');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith('Invalid JSON: ')).toBe(true);
  });
});
