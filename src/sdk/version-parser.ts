/**
 * Version extraction for SDK bundle names such as `iPhoneOS16.2.sdk`
 */
import { VersionKey } from '../types';

export const SDK_BUNDLE_SUFFIX = '.sdk';

export const UNPARSED_VERSION: VersionKey = { kind: 'unparsed' };

const TRAILING_VERSION = /(\d+\.\d+|\d+)$/;

/**
 * Parse the trailing `<major>` or `<major>.<minor>` of a bundle name.
 * Names without trailing digits get the sentinel key; this never throws.
 */
export function parseVersion(rawName: string): VersionKey {
  const name = rawName.endsWith(SDK_BUNDLE_SUFFIX)
    ? rawName.slice(0, -SDK_BUNDLE_SUFFIX.length)
    : rawName;
  const match = TRAILING_VERSION.exec(name);
  if (!match) return UNPARSED_VERSION;

  const components = match[1].split('.').map((part) => Number.parseInt(part, 10));
  if (components.some((n) => !Number.isSafeInteger(n))) return UNPARSED_VERSION;
  return { kind: 'parsed', components };
}

/**
 * Numeric-tuple ordering; missing components count as 0 and the sentinel is lowest
 */
export function compareVersions(a: VersionKey, b: VersionKey): number {
  if (a.kind === 'unparsed' || b.kind === 'unparsed') {
    if (a.kind === b.kind) return 0;
    return a.kind === 'unparsed' ? -1 : 1;
  }
  const length = Math.max(a.components.length, b.components.length);
  for (let i = 0; i < length; i++) {
    const left = a.components[i] ?? 0;
    const right = b.components[i] ?? 0;
    if (left !== right) return left < right ? -1 : 1;
  }
  return 0;
}

export function formatVersion(version: VersionKey): string {
  return version.kind === 'parsed' ? version.components.join('.') : 'unknown';
}
