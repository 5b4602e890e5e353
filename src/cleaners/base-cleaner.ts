/**
 * Base class for path-based cache cleanup categories
 */
import { measure, removePath } from '../core/removal';
import { CacheCleanResult, CacheTarget, CleanContext, CleanupTarget, ExecutionMode, ExecutionOutcome } from '../types';
import { AuditSink } from '../utils/audit-log';
import { formatBytes } from '../utils/formatter';
import { FileSystemOps, nodeFileSystem } from '../utils/fs-ops';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface CleanDeps {
  audit: AuditSink;
  fs?: FileSystemOps;
  logger?: Logger;
}

export abstract class BaseCleaner {
  abstract readonly category: CleanupTarget;
  abstract readonly description: string;

  /**
   * Paths this category owns for the given context
   */
  abstract getTargets(context: CleanContext): Promise<CacheTarget[]>;

  /**
   * Report every target, then delete it or print what would go
   */
  async clean(context: CleanContext, mode: ExecutionMode, deps: CleanDeps): Promise<CacheCleanResult[]> {
    const fsOps = deps.fs ?? nodeFileSystem;
    const log = deps.logger ?? defaultLogger;
    const results: CacheCleanResult[] = [];

    log.info(`=== ${this.description} ===`);
    for (const target of await this.getTargets(context)) {
      const result = await this.cleanTarget(target, mode, fsOps, log);
      deps.audit.append({
        timestamp: new Date().toISOString(),
        category: this.category,
        label: target.label,
        path: target.path,
        result: result.outcome,
        sizeBytes: result.sizeBytes,
        ...(result.reason ? { reason: result.reason } : {}),
      });
      results.push(result);
    }
    return results;
  }

  protected async cleanTarget(
    target: CacheTarget,
    mode: ExecutionMode,
    fsOps: FileSystemOps,
    log: Logger,
  ): Promise<CacheCleanResult> {
    const where = target.contentsOnly ? `${target.path}/*` : target.path;

    if (!(await fsOps.exists(target.path))) {
      log.info(`${target.label} not present.`);
      return { target, outcome: ExecutionOutcome.SKIPPED_ALREADY_ABSENT, sizeBytes: null };
    }

    if (mode === ExecutionMode.DRY_RUN) {
      const sizeBytes = await measure(fsOps, target.path);
      log.info(`${target.label}: ${sizeBytes === null ? 'unknown' : formatBytes(sizeBytes)}`);
      log.info(`DRY-RUN: rm -rf ${where}`);
      return { target, outcome: ExecutionOutcome.WOULD_REMOVE, sizeBytes };
    }

    log.info(`RUN: rm -rf ${where}`);
    const removal = await removePath(fsOps, target.path, target.contentsOnly);
    if (removal.outcome === ExecutionOutcome.FAILED) {
      log.warn(`Failed to clean ${target.label}: ${removal.reason ?? 'unknown error'}`);
    } else if (removal.sizeBytes !== null) {
      log.info(`${target.label}: freed ${formatBytes(removal.sizeBytes)}`);
    }
    return { target, ...removal };
  }
}
