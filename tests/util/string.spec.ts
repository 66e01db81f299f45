import { describe, expect, it } from 'vitest';
import { parseAssignments, parseScalar } from '../../src/util/string.js';

describe('parseScalar', () => {
  it('reads numbers', () => {
    expect(parseScalar('0.5')).toBe(0.5);
    expect(parseScalar('-3')).toBe(-3);
    expect(parseScalar('1e-3')).toBe(0.001);
    expect(parseScalar('.25')).toBe(0.25);
  });

  it('reads booleans and empty values', () => {
    expect(parseScalar('true')).toBe(true);
    expect(parseScalar('false')).toBe(false);
    expect(parseScalar('')).toBeNull();
    expect(parseScalar('   ')).toBeNull();
  });

  it('keeps anything else as text', () => {
    expect(parseScalar('12abc')).toBe('12abc');
    expect(parseScalar('adam')).toBe('adam');
    expect(parseScalar('True')).toBe('True');
  });
});

describe('parseAssignments', () => {
  it('splits on the first equals sign', () => {
    expect(parseAssignments(['loss=0.5', 'note=a=b', 'done=true'])).toEqual({
      loss: 0.5,
      note: 'a=b',
      done: true,
    });
  });

  it('rejects arguments without a key', () => {
    expect(() => parseAssignments(['novalue'])).toThrow('Expected key=value, got: novalue');
    expect(() => parseAssignments(['=1'])).toThrow('Expected key=value, got: =1');
  });
});
