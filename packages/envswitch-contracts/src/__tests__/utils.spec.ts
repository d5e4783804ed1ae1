import { describe, it, expect } from 'vitest';
import { describeError, parseDuration } from '../utils';

describe('parseDuration', () => {
  it('parses single units', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h')).toBe(3_600_000);
  });

  it('parses compound and fractional durations', () => {
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration(' 10s ')).toBe(10_000);
  });

  it('returns null for anything else', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('30')).toBeNull();
    expect(parseDuration('thirty seconds')).toBeNull();
    expect(parseDuration('5d')).toBeNull();
  });
});

describe('describeError', () => {
  it('uses the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
