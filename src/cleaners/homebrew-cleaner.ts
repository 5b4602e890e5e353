/**
 * Homebrew download cache
 */
import * as path from 'path';
import { BaseCleaner } from './base-cleaner';
import { CacheTarget, CleanContext, CleanupTarget } from '../types';

export class HomebrewCleaner extends BaseCleaner {
  readonly category = CleanupTarget.HOMEBREW;
  readonly description = 'Homebrew cleanup';

  async getTargets(context: CleanContext): Promise<CacheTarget[]> {
    return [
      {
        category: this.category,
        label: 'Homebrew cache',
        path: path.join(context.homeDir, 'Library', 'Caches', 'Homebrew'),
        contentsOnly: true,
      },
    ];
  }
}
