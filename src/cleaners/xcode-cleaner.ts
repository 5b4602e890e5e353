/**
 * Xcode build products and simulator caches under ~/Library/Developer
 */
import * as path from 'path';
import { BaseCleaner } from './base-cleaner';
import { CacheTarget, CleanContext, CleanupTarget } from '../types';

export class XcodeCleaner extends BaseCleaner {
  readonly category = CleanupTarget.XCODE;
  readonly description = 'Xcode cleanup';

  async getTargets(context: CleanContext): Promise<CacheTarget[]> {
    const developer = path.join(context.homeDir, 'Library', 'Developer');
    const xcode = path.join(developer, 'Xcode');
    const entries: Array<[string, string]> = [
      ['DerivedData', path.join(xcode, 'DerivedData')],
      ['Archives', path.join(xcode, 'Archives')],
      ['iOS DeviceSupport', path.join(xcode, 'iOS DeviceSupport')],
      ['CoreSimulator Caches', path.join(developer, 'CoreSimulator', 'Caches')],
      // DerivedData/ModuleCache.noindex goes with DerivedData; this one lives beside it
      ['ModuleCache', path.join(xcode, 'ModuleCache.noindex')],
    ];
    return entries.map(([label, target]) => ({
      category: this.category,
      label,
      path: target,
      contentsOnly: true,
    }));
  }
}
