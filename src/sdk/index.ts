/**
 * SDK retention pipeline: discover, parse, decide, apply
 */
import { ExecutionMode, ExecutionResult, RetentionAction } from '../types';
import { AuditSink } from '../utils/audit-log';
import { FileSystemOps } from '../utils/fs-ops';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { discoverSdkCandidates } from './discovery';
import { decideRetention } from './retention';
import { applyDecisions } from './executor';

export * from './version-parser';
export * from './discovery';
export * from './retention';
export * from './executor';

export interface SdkCleanupOptions {
  developerRoot: string | null;
  keepCount: number;
  mode: ExecutionMode;
  audit: AuditSink;
  fs?: FileSystemOps;
  logger?: Logger;
}

export async function runSdkCleanup(options: SdkCleanupOptions): Promise<ExecutionResult[]> {
  const log = options.logger ?? defaultLogger;
  if (!options.developerRoot) {
    log.warn('Xcode developer path not found. Skipping SDK cleanup.');
    return [];
  }
  log.info(`Xcode dev root: ${options.developerRoot}`);

  const candidates = await discoverSdkCandidates(options.developerRoot);
  if (candidates.length === 0) {
    log.info('No SDK directories found under Xcode. Skipping SDK deletion.');
    return [];
  }

  const decisions = decideRetention(candidates, options.keepCount);
  const removing = decisions.filter((d) => d.action === RetentionAction.REMOVE).length;
  log.info(
    `Found ${candidates.length} SDK(s). Keeping newest ${options.keepCount} per platform, ${removing} to remove.`,
  );

  return applyDecisions(decisions, options.mode, {
    audit: options.audit,
    fs: options.fs,
    logger: log,
  });
}
