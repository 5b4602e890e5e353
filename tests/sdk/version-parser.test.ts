// tests/sdk/version-parser.test.ts

import { describe, it, expect } from 'vitest';
import { compareVersions, formatVersion, parseVersion } from '../../src/sdk/version-parser';

describe('parseVersion', () => {
  it('reads major.minor before the bundle suffix', () => {
    expect(parseVersion('iPhoneOS16.2.sdk')).toEqual({ kind: 'parsed', components: [16, 2] });
  });

  it('reads a bare major version', () => {
    expect(parseVersion('MacOSX14')).toEqual({ kind: 'parsed', components: [14] });
  });

  it('keeps multi-digit minor versions numeric', () => {
    expect(parseVersion('iPhoneOS9.10')).toEqual({ kind: 'parsed', components: [9, 10] });
  });

  it('anchors at the end of the name', () => {
    expect(parseVersion('Foo16.2.1.sdk')).toEqual({ kind: 'parsed', components: [2, 1] });
  });

  it('returns the sentinel for names without trailing digits', () => {
    expect(parseVersion('FooBeta')).toEqual({ kind: 'unparsed' });
    expect(parseVersion('FooBeta.sdk')).toEqual({ kind: 'unparsed' });
    expect(parseVersion('iPhoneOS.sdk')).toEqual({ kind: 'unparsed' });
    expect(parseVersion('')).toEqual({ kind: 'unparsed' });
  });

  it('returns the sentinel for numbers too large to compare exactly', () => {
    expect(parseVersion('Foo99999999999999999999')).toEqual({ kind: 'unparsed' });
  });
});

describe('compareVersions', () => {
  it('orders numerically, not lexically', () => {
    const names = ['Foo9.2', 'Foo16.0', 'Foo9.10', 'Foo16.2'];
    const sorted = [...names].sort((a, b) => compareVersions(parseVersion(b), parseVersion(a)));
    expect(sorted).toEqual(['Foo16.2', 'Foo16.0', 'Foo9.10', 'Foo9.2']);
  });

  it('treats missing components as zero', () => {
    expect(compareVersions(parseVersion('Foo16'), parseVersion('Foo16.0'))).toBe(0);
    expect(compareVersions(parseVersion('Foo16'), parseVersion('Foo16.1'))).toBe(-1);
  });

  it('puts the sentinel below every parsed version', () => {
    expect(compareVersions(parseVersion('FooBeta'), parseVersion('Foo0'))).toBe(-1);
    expect(compareVersions(parseVersion('Foo0'), parseVersion('FooBeta'))).toBe(1);
    expect(compareVersions(parseVersion('FooBeta'), parseVersion('BarAlpha'))).toBe(0);
  });
});

describe('formatVersion', () => {
  it('renders parsed keys and the sentinel', () => {
    expect(formatVersion(parseVersion('MacOSX13.4.sdk'))).toBe('13.4');
    expect(formatVersion(parseVersion('FooBeta'))).toBe('unknown');
  });
});
