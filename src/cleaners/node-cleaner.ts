/**
 * Project-local node_modules
 */
import * as path from 'path';
import { BaseCleaner } from './base-cleaner';
import { CacheTarget, CleanContext, CleanupTarget } from '../types';

export class NodeCleaner extends BaseCleaner {
  readonly category = CleanupTarget.NODE;
  readonly description = 'Node project cleanup';

  async getTargets(context: CleanContext): Promise<CacheTarget[]> {
    return [
      {
        category: this.category,
        label: 'node_modules',
        path: path.join(context.projectRoot, 'node_modules'),
        contentsOnly: false,
      },
    ];
  }
}
