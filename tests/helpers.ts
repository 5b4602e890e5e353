// tests/helpers.ts

import { mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { parseVersion } from '../src/sdk/version-parser';
import { SdkCandidate } from '../src/types';
import { FileSystemOps } from '../src/utils/fs-ops';
import { createLogger, Logger, LogLevel } from '../src/utils/logger';

export function createTmpDir(): string {
  const dir = join(tmpdir(), `devsweep-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function writeFile(dir: string, path: string, content: string): void {
  const full = join(dir, path);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content, 'utf-8');
}

export function silentLogger(): Logger {
  return createLogger(LogLevel.SILENT, () => {});
}

export function capturingLogger(lines: string[]): Logger {
  return createLogger(LogLevel.DEBUG, (line) => lines.push(line));
}

export function candidate(platform: string, rawName: string): SdkCandidate {
  return {
    platform,
    rawName,
    path: `/Dev/Platforms/${platform}.platform/Developer/SDKs/${rawName}`,
    version: parseVersion(rawName),
  };
}

/**
 * In-memory filesystem: path -> size. Paths in `failing` reject removal with EACCES,
 * paths in `sticky` survive removal silently.
 */
export class FakeFileSystem implements FileSystemOps {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  readonly sticky = new Set<string>();

  constructor(readonly entries: Map<string, number> = new Map()) {}

  async exists(target: string): Promise<boolean> {
    this.calls.push(`exists ${target}`);
    return this.entries.has(target);
  }

  async sizeOf(target: string): Promise<number | null> {
    this.calls.push(`sizeOf ${target}`);
    return this.entries.get(target) ?? null;
  }

  async list(target: string): Promise<string[]> {
    this.calls.push(`list ${target}`);
    return [...this.entries.keys()].filter((p) => dirname(p) === target).map((p) => basename(p)).sort();
  }

  async remove(target: string): Promise<void> {
    this.calls.push(`remove ${target}`);
    if (this.failing.has(target)) {
      throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
    }
    if (!this.sticky.has(target)) this.entries.delete(target);
  }
}
