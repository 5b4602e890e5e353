/**
 * Core type definitions for devsweep
 */

export enum CleanupTarget {
  XCODE = 'xcode',
  NODE = 'node',
  PYTHON = 'python',
  JAVA = 'java',
  HOMEBREW = 'homebrew',
}

export enum ExecutionMode {
  DRY_RUN = 'dry-run',
  APPLY = 'apply',
}

export enum RetentionAction {
  KEEP = 'KEEP',
  REMOVE = 'REMOVE',
}

export enum ExecutionOutcome {
  SKIPPED_KEPT = 'SKIPPED_KEPT',
  WOULD_REMOVE = 'WOULD_REMOVE',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  SKIPPED_ALREADY_ABSENT = 'SKIPPED_ALREADY_ABSENT',
}

/**
 * Ordered version key. `unparsed` is the sentinel and sorts below every parsed key.
 */
export type VersionKey =
  | { kind: 'parsed'; components: readonly number[] }
  | { kind: 'unparsed' };

export interface DiscoveredSdk {
  platform: string;
  path: string;
  rawName: string;
}

export interface SdkCandidate extends DiscoveredSdk {
  version: VersionKey;
}

export interface RetentionDecision {
  candidate: SdkCandidate;
  action: RetentionAction;
  rank: number; // 1-based within the platform group
}

export interface ExecutionResult {
  decision: RetentionDecision;
  outcome: ExecutionOutcome;
  sizeBytes: number | null; // null when unknown
  reason?: string;
}

export interface CacheTarget {
  category: CleanupTarget;
  label: string;
  path: string;
  contentsOnly: boolean; // remove the entries inside, keep the directory
}

export interface CacheCleanResult {
  target: CacheTarget;
  outcome: Exclude<ExecutionOutcome, ExecutionOutcome.SKIPPED_KEPT>;
  sizeBytes: number | null;
  reason?: string;
}

export interface CleanContext {
  projectRoot: string;
  homeDir: string;
}

export interface SweepReport {
  mode: ExecutionMode;
  keepSdkCount: number;
  developerRoot: string | null;
  sdks: ExecutionResult[];
  caches: CacheCleanResult[];
}
