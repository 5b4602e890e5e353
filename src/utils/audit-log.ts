/**
 * Append-only audit trail: one structured entry per cleanup outcome
 */
import * as fs from 'fs-extra';
import { CleanupTarget, ExecutionOutcome, RetentionAction } from '../types';

export interface AuditEntry {
  timestamp: string;
  category: CleanupTarget | 'sdk';
  path: string;
  result: ExecutionOutcome;
  sizeBytes: number | null;
  platform?: string;
  version?: string;
  rank?: number;
  action?: RetentionAction;
  label?: string;
  reason?: string;
}

export interface AuditSink {
  append(entry: AuditEntry): void;
}

/**
 * Writes JSON lines synchronously so the file order equals processing order
 */
export class JsonlAuditSink implements AuditSink {
  constructor(readonly filePath: string) {
    fs.ensureFileSync(filePath);
  }

  append(entry: AuditEntry): void {
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  append(entry: AuditEntry): void {
    this.entries.push(entry);
  }
}
