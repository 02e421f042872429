import { describe, expect, it } from 'vitest';
import { parseDuration } from '../src/connections/config/app.config';

describe('parseDuration', () => {
  it('converts unit suffixes to seconds', () => {
    expect(parseDuration('45')).toBe(45);
    expect(parseDuration('30s')).toBe(30);
    expect(parseDuration('30m')).toBe(1800);
    expect(parseDuration('2h')).toBe(7200);
    expect(parseDuration('7d')).toBe(604800);
  });

  it('rejects anything else', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration: soon');
    expect(() => parseDuration('-5m')).toThrow();
  });
});
