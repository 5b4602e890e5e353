/**
 * Carries out retention decisions: dry-run reporting or real deletion
 */
import { removePath, measure } from '../core/removal';
import { ExecutionMode, ExecutionOutcome, ExecutionResult, RetentionAction, RetentionDecision } from '../types';
import { AuditSink } from '../utils/audit-log';
import { formatBytes } from '../utils/formatter';
import { FileSystemOps, nodeFileSystem } from '../utils/fs-ops';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { formatVersion } from './version-parser';

export interface ExecutionDeps {
  audit: AuditSink;
  fs?: FileSystemOps;
  logger?: Logger;
}

/**
 * Platform groups in order of first appearance, rank ascending inside each group
 */
export function orderForExecution(decisions: readonly RetentionDecision[]): RetentionDecision[] {
  const groups = new Map<string, RetentionDecision[]>();
  for (const decision of decisions) {
    const group = groups.get(decision.candidate.platform) || [];
    group.push(decision);
    groups.set(decision.candidate.platform, group);
  }
  return [...groups.values()].flatMap((group) => [...group].sort((a, b) => a.rank - b.rank));
}

function sizeLabel(sizeBytes: number | null): string {
  return sizeBytes === null ? 'unknown' : formatBytes(sizeBytes);
}

async function execute(
  decision: RetentionDecision,
  mode: ExecutionMode,
  fsOps: FileSystemOps,
): Promise<ExecutionResult> {
  const { path } = decision.candidate;
  if (decision.action === RetentionAction.KEEP) {
    return { decision, outcome: ExecutionOutcome.SKIPPED_KEPT, sizeBytes: null };
  }
  if (mode === ExecutionMode.DRY_RUN) {
    return { decision, outcome: ExecutionOutcome.WOULD_REMOVE, sizeBytes: await measure(fsOps, path) };
  }
  return { decision, ...(await removePath(fsOps, path)) };
}

function report(result: ExecutionResult, log: Logger): void {
  const { candidate, rank } = result.decision;
  const where = `${candidate.path} (version ${formatVersion(candidate.version)}, rank ${rank})`;
  switch (result.outcome) {
    case ExecutionOutcome.SKIPPED_KEPT:
      log.info(`Keeping SDK: ${where}`);
      break;
    case ExecutionOutcome.WOULD_REMOVE:
      log.info(`DRY-RUN: would remove SDK ${where} size=${sizeLabel(result.sizeBytes)}`);
      break;
    case ExecutionOutcome.SUCCEEDED:
      log.info(`Removed SDK ${where} freed=${sizeLabel(result.sizeBytes)}`);
      break;
    case ExecutionOutcome.SKIPPED_ALREADY_ABSENT:
      log.info(`SDK already absent: ${where}`);
      break;
    case ExecutionOutcome.FAILED:
      log.warn(`Failed to remove SDK ${where}: ${result.reason ?? 'unknown error'}`);
      if (result.reason?.startsWith('EACCES') || result.reason?.startsWith('EPERM')) {
        log.warn('SDK directories usually belong to root; re-run with elevated privileges to remove them.');
      }
      break;
  }
}

/**
 * Apply decisions one at a time. Each outcome is logged and audited before the next
 * candidate starts; a failed deletion is recorded and never aborts the batch.
 */
export async function applyDecisions(
  decisions: readonly RetentionDecision[],
  mode: ExecutionMode,
  deps: ExecutionDeps,
): Promise<ExecutionResult[]> {
  const fsOps = deps.fs ?? nodeFileSystem;
  const log = deps.logger ?? defaultLogger;
  const results: ExecutionResult[] = [];

  let currentPlatform: string | null = null;
  for (const decision of orderForExecution(decisions)) {
    const { candidate } = decision;
    if (candidate.platform !== currentPlatform) {
      currentPlatform = candidate.platform;
      log.info(`Platform: ${currentPlatform}`);
    }

    const result = await execute(decision, mode, fsOps);
    deps.audit.append({
      timestamp: new Date().toISOString(),
      category: 'sdk',
      platform: candidate.platform,
      path: candidate.path,
      version: formatVersion(candidate.version),
      rank: decision.rank,
      action: decision.action,
      result: result.outcome,
      sizeBytes: result.sizeBytes,
      ...(result.reason ? { reason: result.reason } : {}),
    });
    report(result, log);
    results.push(result);
  }

  return results;
}
