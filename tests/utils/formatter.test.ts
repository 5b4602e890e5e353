// tests/utils/formatter.test.ts

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  computeTotals,
  formatBytes,
  formatSdkTable,
  formatSummary,
  renderReport,
  serializeReport,
  truncatePath,
} from '../../src/utils/formatter';
import { CleanupTarget, ExecutionMode, ExecutionOutcome, RetentionAction, SweepReport } from '../../src/types';
import { candidate } from '../helpers';

beforeAll(() => { chalk.level = 0; });

const kept = candidate('iPhoneOS', 'iPhoneOS16.2.sdk');
const old = candidate('iPhoneOS', 'iPhoneOS16.0.sdk');
const beta = candidate('iPhoneOS', 'iPhoneOSBeta.sdk');

function report(mode: ExecutionMode): SweepReport {
  return {
    mode,
    keepSdkCount: 1,
    developerRoot: '/Dev',
    sdks: [
      { decision: { candidate: kept, action: RetentionAction.KEEP, rank: 1 }, outcome: ExecutionOutcome.SKIPPED_KEPT, sizeBytes: null },
      { decision: { candidate: old, action: RetentionAction.REMOVE, rank: 2 }, outcome: ExecutionOutcome.WOULD_REMOVE, sizeBytes: 100 },
      { decision: { candidate: beta, action: RetentionAction.REMOVE, rank: 3 }, outcome: ExecutionOutcome.WOULD_REMOVE, sizeBytes: null },
    ],
    caches: [
      {
        target: { category: CleanupTarget.NODE, label: 'node_modules', path: '/work/node_modules', contentsOnly: false },
        outcome: ExecutionOutcome.FAILED,
        sizeBytes: 50,
        reason: 'EPERM: operation not permitted',
      },
    ],
  };
}

describe('formatBytes', () => {
  it('scales by powers of 1024', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5 GB');
  });
});

describe('truncatePath', () => {
  it('keeps short paths and elides the middle of long ones', () => {
    expect(truncatePath('/short', 20)).toBe('/short');
    expect(truncatePath('/a/very/long/path/to/somewhere', 20)).toBe('/a/ve...to/somewhere');
  });
});

describe('report totals', () => {
  it('sums planned sizes and counts failures', () => {
    expect(computeTotals(report(ExecutionMode.DRY_RUN))).toEqual({
      reclaimable_bytes: 100,
      reclaimed_bytes: 0,
      failures: 1,
    });
  });

  it('summarizes a dry run', () => {
    expect(formatSummary(report(ExecutionMode.DRY_RUN))).toBe('Summary (dry-run): Estimated savings: 100 B, 1 failed');
  });
});

describe('serializeReport', () => {
  it('flattens results into plain rows', () => {
    const serialized = serializeReport(report(ExecutionMode.DRY_RUN));
    expect(serialized.sdks[2]).toEqual({
      platform: 'iPhoneOS',
      path: beta.path,
      rawName: 'iPhoneOSBeta.sdk',
      version: 'unknown',
      rank: 3,
      action: 'REMOVE',
      result: 'WOULD_REMOVE',
      size_bytes: null,
    });
    expect(serialized.caches[0]).toEqual({
      category: 'node',
      label: 'node_modules',
      path: '/work/node_modules',
      result: 'FAILED',
      size_bytes: 50,
      reason: 'EPERM: operation not permitted',
    });
  });

  it('renders JSON that parses back to the serialized report', () => {
    const value = report(ExecutionMode.APPLY);
    expect(JSON.parse(renderReport(value, 'json'))).toEqual(serializeReport(value));
  });

  it('renders YAML', () => {
    const yaml = renderReport(report(ExecutionMode.DRY_RUN), 'yaml');
    expect(yaml.startsWith('mode: dry-run\nkeep_sdk_count: 1\ndeveloper_root: /Dev\n')).toBe(true);
  });
});

describe('formatSdkTable', () => {
  it('lists each platform once with ranked rows', () => {
    const lines = formatSdkTable(report(ExecutionMode.DRY_RUN).sdks);
    expect(lines.filter((line) => line === '\niPhoneOS')).toHaveLength(1);
    expect(lines[lines.length - 1]).toBe(
      `  #3   REMOVE  ${'iPhoneOSBeta.sdk'.padEnd(24)} ${'unknown'.padEnd(8)} ${'unknown'.padEnd(10)} would remove`,
    );
  });
});
