import { describe, it, expect } from 'vitest';
import { compareOrderKeys, deriveOrderKey, sortByOrderKey } from '../ordering/order-key.js';

function order(names: string[]): string[] {
  return sortByOrderKey(names, deriveOrderKey);
}

describe('deriveOrderKey', () => {
  it('should split leading digits from the suffix', () => {
    const key = deriveOrderKey('1a_intro.md');

    expect(key.numericPrefix).toBe(1n);
    expect(key.alphaSuffix).toBe('a_intro');
    expect(key.rawName).toBe('1a_intro.md');
  });

  it('should ignore leading zeros in the value', () => {
    expect(deriveOrderKey('007_bond.md').numericPrefix).toBe(7n);
    expect(deriveOrderKey('007_bond.md').alphaSuffix).toBe('_bond');
  });

  it('should treat names without leading digits as pure suffix', () => {
    const key = deriveOrderKey('intro2.md');

    expect(key.numericPrefix).toBeUndefined();
    expect(key.alphaSuffix).toBe('intro2');
  });

  it('should strip the extension case-insensitively', () => {
    expect(deriveOrderKey('3b.MD').alphaSuffix).toBe('b');
  });

  it('should give an empty stem an absent prefix and empty suffix', () => {
    const key = deriveOrderKey('.md');

    expect(key.numericPrefix).toBeUndefined();
    expect(key.alphaSuffix).toBe('');
  });

  it('should parse digit runs beyond the safe integer range', () => {
    const key = deriveOrderKey('123456789012345678901234567890.md');

    expect(key.numericPrefix).toBe(123456789012345678901234567890n);
  });
});

describe('sortByOrderKey', () => {
  it('should order 1, 1a, 1b, 2, 10 numerically', () => {
    expect(order(['10.md', '2.md', '1b.md', '1.md', '1a.md'])).toEqual([
      '1.md',
      '1a.md',
      '1b.md',
      '2.md',
      '10.md',
    ]);
  });

  it('should put the plain number before its suffixed variants', () => {
    expect(order(['3_zeta.md', '3_alpha.md', '3.md'])).toEqual(['3.md', '3_alpha.md', '3_zeta.md']);
  });

  it('should put numbered names before unnumbered ones', () => {
    expect(order(['appendix.md', '20.md', 'intro.md', '5.md'])).toEqual([
      '5.md',
      '20.md',
      'appendix.md',
      'intro.md',
    ]);
  });

  it('should compare mixed suffixes as opaque strings', () => {
    // a10 < a9 in code point order
    expect(order(['1a9.md', '1a10.md'])).toEqual(['1a10.md', '1a9.md']);
  });

  it('should keep listing order for equal keys', () => {
    const entries = [
      { id: 'first', name: '01.md' },
      { id: 'second', name: '1.md' },
      { id: 'third', name: '001.md' },
    ];

    const sorted = sortByOrderKey(entries, entry => deriveOrderKey(entry.name));

    expect(sorted.map(entry => entry.id)).toEqual(['first', 'second', 'third']);
  });

  it('should sort empty stems after numbered names, stably', () => {
    const entries = [
      { id: 'a', name: '.md' },
      { id: 'b', name: '2.md' },
      { id: 'c', name: '.MD' },
    ];

    const sorted = sortByOrderKey(entries, entry => deriveOrderKey(entry.name));

    expect(sorted.map(entry => entry.id)).toEqual(['b', 'a', 'c']);
  });

  it('should not mutate its input', () => {
    const names = ['2.md', '1.md'];
    order(names);
    expect(names).toEqual(['2.md', '1.md']);
  });
});

describe('compareOrderKeys', () => {
  it('should report absent prefix as greater', () => {
    expect(compareOrderKeys(deriveOrderKey('x.md'), deriveOrderKey('9.md'))).toBe(1);
    expect(compareOrderKeys(deriveOrderKey('9.md'), deriveOrderKey('x.md'))).toBe(-1);
  });

  it('should compare suffixes by code point, not locale', () => {
    expect(compareOrderKeys(deriveOrderKey('1B.md'), deriveOrderKey('1a.md'))).toBeLessThan(0);
  });
});
