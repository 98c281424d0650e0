import { describe, it, expect } from 'vitest';
import { megabytesToBytes, normalizeExtension } from '../src/config';

describe('normalizeExtension', () => {
  it('should add a missing leading dot', () => {
    expect(normalizeExtension('txt')).toBe('.txt');
  });

  it('should keep an existing dot and trim whitespace', () => {
    expect(normalizeExtension(' .jpg ')).toBe('.jpg');
  });

  it('should preserve case', () => {
    expect(normalizeExtension('JPG')).toBe('.JPG');
  });

  it('should treat blank input as no filter', () => {
    expect(normalizeExtension('')).toBeUndefined();
    expect(normalizeExtension('   ')).toBeUndefined();
    expect(normalizeExtension(undefined)).toBeUndefined();
  });
});

describe('megabytesToBytes', () => {
  it('should convert whole and fractional megabytes', () => {
    expect(megabytesToBytes(1)).toBe(1048576);
    expect(megabytesToBytes(1.5)).toBe(1572864);
  });

  it('should disable the filter for zero, negative and invalid sizes', () => {
    expect(megabytesToBytes(0)).toBe(0);
    expect(megabytesToBytes(-3)).toBe(0);
    expect(megabytesToBytes(Number.NaN)).toBe(0);
  });
});
