/**
 * Cleaner factory and exports
 */
import { BaseCleaner } from './base-cleaner';
import { XcodeCleaner } from './xcode-cleaner';
import { NodeCleaner } from './node-cleaner';
import { PythonCleaner, findPycacheDirs } from './python-cleaner';
import { JavaCleaner } from './java-cleaner';
import { HomebrewCleaner } from './homebrew-cleaner';
import { CleanupTarget } from '../types';

export { BaseCleaner, XcodeCleaner, NodeCleaner, PythonCleaner, JavaCleaner, HomebrewCleaner, findPycacheDirs };
export type { CleanDeps } from './base-cleaner';

export function getCleaner(target: CleanupTarget): BaseCleaner {
  switch (target) {
    case CleanupTarget.XCODE:
      return new XcodeCleaner();
    case CleanupTarget.NODE:
      return new NodeCleaner();
    case CleanupTarget.PYTHON:
      return new PythonCleaner();
    case CleanupTarget.JAVA:
      return new JavaCleaner();
    case CleanupTarget.HOMEBREW:
      return new HomebrewCleaner();
    default:
      throw new Error(`Unsupported cleanup target: ${String(target)}`);
  }
}

export function getCleaners(targets: readonly CleanupTarget[]): BaseCleaner[] {
  return targets.map(getCleaner);
}
