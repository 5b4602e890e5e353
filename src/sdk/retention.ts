/**
 * Keep-newest-N retention policy for SDK candidates. Pure: no I/O.
 */
import { RetentionAction, RetentionDecision, SdkCandidate } from '../types';
import { ConfigError } from '../utils/errors';
import { compareVersions } from './version-parser';

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Ranking order: newest version first, then rawName ascending, then path ascending
 */
export function compareCandidates(a: SdkCandidate, b: SdkCandidate): number {
  return (
    compareVersions(b.version, a.version) ||
    compareCodeUnits(a.rawName, b.rawName) ||
    compareCodeUnits(a.path, b.path)
  );
}

export function groupByPlatform(candidates: readonly SdkCandidate[]): Map<string, SdkCandidate[]> {
  const groups = new Map<string, SdkCandidate[]>();
  for (const candidate of candidates) {
    const group = groups.get(candidate.platform) || [];
    group.push(candidate);
    groups.set(candidate.platform, group);
  }
  return groups;
}

/**
 * Rank each platform group and keep its top `keepCount` entries.
 * Groups come out in platform order, each group in rank order.
 */
export function decideRetention(candidates: readonly SdkCandidate[], keepCount: number): RetentionDecision[] {
  if (!Number.isInteger(keepCount) || keepCount < 0) {
    throw new ConfigError(`keepCount must be a non-negative integer (got ${keepCount})`, 'keepSdkCount');
  }

  const groups = groupByPlatform(candidates);
  const platforms = [...groups.keys()].sort(compareCodeUnits);
  const decisions: RetentionDecision[] = [];

  for (const platform of platforms) {
    const ranked = [...(groups.get(platform) || [])].sort(compareCandidates);
    ranked.forEach((candidate, index) => {
      const rank = index + 1;
      decisions.push({
        candidate,
        rank,
        action: rank <= keepCount ? RetentionAction.KEEP : RetentionAction.REMOVE,
      });
    });
  }

  return decisions;
}
