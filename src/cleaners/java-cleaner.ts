/**
 * Gradle and Maven caches in the home directory
 */
import * as path from 'path';
import { BaseCleaner } from './base-cleaner';
import { CacheTarget, CleanContext, CleanupTarget } from '../types';

export class JavaCleaner extends BaseCleaner {
  readonly category = CleanupTarget.JAVA;
  readonly description = 'Java cleanup';

  async getTargets(context: CleanContext): Promise<CacheTarget[]> {
    return [
      {
        category: this.category,
        label: 'Gradle caches',
        path: path.join(context.homeDir, '.gradle', 'caches'),
        contentsOnly: false,
      },
      {
        category: this.category,
        label: 'Maven repository',
        path: path.join(context.homeDir, '.m2', 'repository'),
        contentsOnly: false,
      },
    ];
  }
}
