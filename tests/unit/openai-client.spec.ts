import { describe, it, expect } from 'vitest';
import { parseJsonLoose } from '@/lib/openai-client';

describe('parseJsonLoose', () => {
  it('parses strict JSON', () => {
    expect(parseJsonLoose('{"done":false,"code":"x = 1","explanation":"Assign."}')).toEqual({
      done: false,
      code: 'x = 1',
      explanation: 'Assign.'
    });
  });

  it('repairs slightly malformed output', () => {
    expect(parseJsonLoose("{done: true, code: '', explanation: '',}")).toEqual({ done: true, code: '', explanation: '' });
  });

  it('gives up on empty output', () => {
    expect(() => parseJsonLoose('')).toThrow('OpenAI returned non-JSON output');
  });
});
