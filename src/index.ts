/**
 * Programmatic API for devsweep
 */
export * from './types';
export * from './sdk';
export * from './cleaners';
export { runSweep } from './core/sweep';
export type { SweepDeps, SweepOptions } from './core/sweep';
export { removePath, measure } from './core/removal';
export type { RemovalOutcome } from './core/removal';
export * from './utils/audit-log';
export * from './utils/config';
export { ConfigError, CommandError } from './utils/errors';
export { nodeFileSystem } from './utils/fs-ops';
export type { FileSystemOps } from './utils/fs-ops';
export { Logger, LogLevel, createLogger } from './utils/logger';
export { renderReport, serializeReport, formatBytes } from './utils/formatter';
export type { OutputFormat, SerializedReport } from './utils/formatter';
