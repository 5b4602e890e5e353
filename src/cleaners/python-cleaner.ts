/**
 * __pycache__ directories under the project root
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import { BaseCleaner } from './base-cleaner';
import { CacheTarget, CleanContext, CleanupTarget } from '../types';

const PYCACHE_DIR = '__pycache__';
const MAX_DEPTH = 10;

export class PythonCleaner extends BaseCleaner {
  readonly category = CleanupTarget.PYTHON;
  readonly description = 'Python project cleanup';

  async getTargets(context: CleanContext): Promise<CacheTarget[]> {
    const found = await findPycacheDirs(context.projectRoot);
    return found.map((dir) => ({
      category: this.category,
      label: `pycache ${path.relative(context.projectRoot, dir) || dir}`,
      path: dir,
      contentsOnly: false,
    }));
  }
}

/**
 * Depth-limited walk; dot-directories and node_modules are not entered
 */
export async function findPycacheDirs(rootDir: string): Promise<string[]> {
  const found: string[] = [];

  const searchDir = async (dir: string, depth: number): Promise<void> => {
    if (depth > MAX_DEPTH) return;

    let entries: fs.Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return; // unreadable
    }

    const names = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
    for (const name of names) {
      if (name === PYCACHE_DIR) {
        found.push(path.join(dir, name));
      } else if (!name.startsWith('.') && name !== 'node_modules') {
        await searchDir(path.join(dir, name), depth + 1);
      }
    }
  };

  await searchDir(rootDir, 0);
  return found;
}
