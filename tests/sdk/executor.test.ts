// tests/sdk/executor.test.ts

import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { existsSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { applyDecisions, orderForExecution } from '../../src/sdk/executor';
import { decideRetention } from '../../src/sdk/retention';
import { ExecutionMode, ExecutionOutcome, RetentionAction } from '../../src/types';
import { MemoryAuditSink } from '../../src/utils/audit-log';
import { candidate, capturingLogger, createTmpDir, FakeFileSystem, silentLogger, writeFile } from '../helpers';

const foo3 = candidate('Foo', 'Foo3.sdk');
const foo2 = candidate('Foo', 'Foo2.sdk');
const foo1 = candidate('Foo', 'Foo1.sdk');

beforeAll(() => { chalk.level = 0; });

describe('applyDecisions', () => {
  it('records a failed deletion and still attempts the rest', async () => {
    const fs = new FakeFileSystem(new Map([[foo3.path, 300], [foo2.path, 200], [foo1.path, 100]]));
    fs.failing.add(foo2.path);
    const audit = new MemoryAuditSink();

    const results = await applyDecisions(decideRetention([foo1, foo2, foo3], 0), ExecutionMode.APPLY, {
      fs,
      audit,
      logger: silentLogger(),
    });

    expect(results.map((r) => [r.decision.candidate.rawName, r.outcome])).toEqual([
      ['Foo3.sdk', ExecutionOutcome.SUCCEEDED],
      ['Foo2.sdk', ExecutionOutcome.FAILED],
      ['Foo1.sdk', ExecutionOutcome.SUCCEEDED],
    ]);
    expect(results[1].reason).toBe('EACCES: permission denied');
    expect(results[1].sizeBytes).toBe(200);
    expect(fs.calls.filter((c) => c.startsWith('remove'))).toEqual([
      `remove ${foo3.path}`,
      `remove ${foo2.path}`,
      `remove ${foo1.path}`,
    ]);
    expect(audit.entries.map((e) => [e.path, e.result, e.reason])).toEqual([
      [foo3.path, ExecutionOutcome.SUCCEEDED, undefined],
      [foo2.path, ExecutionOutcome.FAILED, 'EACCES: permission denied'],
      [foo1.path, ExecutionOutcome.SUCCEEDED, undefined],
    ]);
  });

  it('reports sizes in dry run without touching the filesystem', async () => {
    const fs = new FakeFileSystem(new Map([[foo3.path, 300], [foo2.path, 200]]));
    const audit = new MemoryAuditSink();

    const results = await applyDecisions(decideRetention([foo1, foo2, foo3], 1), ExecutionMode.DRY_RUN, {
      fs,
      audit,
      logger: silentLogger(),
    });

    expect(results.map((r) => [r.decision.rank, r.outcome, r.sizeBytes])).toEqual([
      [1, ExecutionOutcome.SKIPPED_KEPT, null],
      [2, ExecutionOutcome.WOULD_REMOVE, 200],
      [3, ExecutionOutcome.WOULD_REMOVE, null],
    ]);
    expect(fs.calls).toEqual([`sizeOf ${foo2.path}`, `sizeOf ${foo1.path}`]);
    expect(fs.entries.size).toBe(2);
  });

  it('writes one audit entry per candidate with its decision', async () => {
    const audit = new MemoryAuditSink();
    await applyDecisions(decideRetention([foo1, foo3], 1), ExecutionMode.DRY_RUN, {
      fs: new FakeFileSystem(new Map([[foo1.path, 100]])),
      audit,
      logger: silentLogger(),
    });

    expect(audit.entries).toHaveLength(2);
    expect(audit.entries[0]).toMatchObject({
      category: 'sdk',
      platform: 'Foo',
      path: foo3.path,
      version: '3',
      rank: 1,
      action: RetentionAction.KEEP,
      result: ExecutionOutcome.SKIPPED_KEPT,
      sizeBytes: null,
    });
    expect(audit.entries[1]).toMatchObject({
      path: foo1.path,
      version: '1',
      rank: 2,
      action: RetentionAction.REMOVE,
      result: ExecutionOutcome.WOULD_REMOVE,
      sizeBytes: 100,
    });
  });

  it('skips candidates that are already gone', async () => {
    const results = await applyDecisions(decideRetention([foo1], 0), ExecutionMode.APPLY, {
      fs: new FakeFileSystem(),
      audit: new MemoryAuditSink(),
      logger: silentLogger(),
    });
    expect(results[0].outcome).toBe(ExecutionOutcome.SKIPPED_ALREADY_ABSENT);
  });

  it('fails a candidate whose path survives deletion', async () => {
    const fs = new FakeFileSystem(new Map([[foo1.path, 100]]));
    fs.sticky.add(foo1.path);
    const results = await applyDecisions(decideRetention([foo1], 0), ExecutionMode.APPLY, {
      fs,
      audit: new MemoryAuditSink(),
      logger: silentLogger(),
    });
    expect(results[0].outcome).toBe(ExecutionOutcome.FAILED);
    expect(results[0].reason).toBe('path still present after removal');
  });

  it('logs kept and removed candidates in rank order', async () => {
    const lines: string[] = [];
    await applyDecisions(decideRetention([foo1, foo2], 1), ExecutionMode.DRY_RUN, {
      fs: new FakeFileSystem(new Map([[foo1.path, 2048]])),
      audit: new MemoryAuditSink(),
      logger: capturingLogger(lines),
    });
    expect(lines).toEqual([
      '[INFO] Platform: Foo',
      `[INFO] Keeping SDK: ${foo2.path} (version 2, rank 1)`,
      `[INFO] DRY-RUN: would remove SDK ${foo1.path} (version 1, rank 2) size=2 KB`,
    ]);
  });

  it('adds a privilege hint for permission failures', async () => {
    const lines: string[] = [];
    const fs = new FakeFileSystem(new Map([[foo1.path, 100]]));
    fs.failing.add(foo1.path);
    await applyDecisions(decideRetention([foo1], 0), ExecutionMode.APPLY, {
      fs,
      audit: new MemoryAuditSink(),
      logger: capturingLogger(lines),
    });
    expect(lines).toContain(
      `[WARN] Failed to remove SDK ${foo1.path} (version 1, rank 1): EACCES: permission denied`,
    );
    expect(lines).toContain(
      '[WARN] SDK directories usually belong to root; re-run with elevated privileges to remove them.',
    );
  });

  describe('on a real directory tree', () => {
    let dir: string;

    afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

    it('removes the bundle and reports its size', async () => {
      dir = createTmpDir();
      const bundle = join(dir, 'Bar1.sdk');
      writeFile(bundle, 'a', 'hello');
      writeFile(bundle, 'b/c', 'abc');
      mkdirSync(join(bundle, 'empty'));

      const results = await applyDecisions(
        [{ candidate: { platform: 'Bar', path: bundle, rawName: 'Bar1.sdk', version: { kind: 'parsed', components: [1] } }, action: RetentionAction.REMOVE, rank: 1 }],
        ExecutionMode.APPLY,
        { audit: new MemoryAuditSink(), logger: silentLogger() },
      );

      expect(results[0].outcome).toBe(ExecutionOutcome.SUCCEEDED);
      expect(results[0].sizeBytes).toBe(8);
      expect(existsSync(bundle)).toBe(false);
    });
  });
});

describe('orderForExecution', () => {
  it('groups by platform and sorts each group by rank', () => {
    const decisions = decideRetention([foo1, foo2, foo3, candidate('Bar', 'Bar1.sdk')], 1);
    const shuffled = [decisions[3], decisions[0], decisions[2], decisions[1]];
    expect(orderForExecution(shuffled).map((d) => `${d.candidate.platform}#${d.rank}`)).toEqual([
      'Foo#1',
      'Foo#2',
      'Foo#3',
      'Bar#1',
    ]);
  });
});
