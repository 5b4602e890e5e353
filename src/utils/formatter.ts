/**
 * Output formatting utilities for the devsweep CLI
 * Provides human-readable, JSON, and YAML output formats
 */
import chalk from 'chalk';
import * as YAML from 'yaml';
import { formatVersion } from '../sdk/version-parser';
import { CacheCleanResult, ExecutionMode, ExecutionOutcome, ExecutionResult, SweepReport } from '../types';

export type OutputFormat = 'table' | 'json' | 'yaml';

/**
 * Format bytes into a human-readable string
 */
export function formatBytes(bytes: number): string {
    if (bytes <= 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Truncate a path to fit within maxLen characters
 */
export function truncatePath(pathStr: string, maxLen: number): string {
    if (pathStr.length <= maxLen) return pathStr;
    const ellipsis = '...';
    const start = Math.floor((maxLen - ellipsis.length) / 3);
    const end = maxLen - ellipsis.length - start;
    return pathStr.slice(0, start) + ellipsis + pathStr.slice(-end);
}

function sizeText(sizeBytes: number | null): string {
    return sizeBytes === null ? 'unknown' : formatBytes(sizeBytes);
}

/**
 * Get color for an outcome
 */
function getOutcomeColor(outcome: ExecutionOutcome): chalk.Chalk {
    switch (outcome) {
        case ExecutionOutcome.SKIPPED_KEPT:
            return chalk.green;
        case ExecutionOutcome.WOULD_REMOVE:
            return chalk.yellow;
        case ExecutionOutcome.SUCCEEDED:
            return chalk.blue;
        case ExecutionOutcome.FAILED:
            return chalk.red;
        default:
            return chalk.gray;
    }
}

/**
 * Get human-readable outcome text
 */
export function formatOutcome(outcome: ExecutionOutcome): string {
    switch (outcome) {
        case ExecutionOutcome.SKIPPED_KEPT:
            return 'kept';
        case ExecutionOutcome.WOULD_REMOVE:
            return 'would remove';
        case ExecutionOutcome.SUCCEEDED:
            return 'removed';
        case ExecutionOutcome.FAILED:
            return 'failed';
        case ExecutionOutcome.SKIPPED_ALREADY_ABSENT:
            return 'already absent';
    }
}

export interface SdkReportRow {
    platform: string;
    path: string;
    rawName: string;
    version: string;
    rank: number;
    action: string;
    result: ExecutionOutcome;
    size_bytes: number | null;
    reason?: string;
}

export interface CacheReportRow {
    category: string;
    label: string;
    path: string;
    result: ExecutionOutcome;
    size_bytes: number | null;
    reason?: string;
}

export interface ReportTotals {
    reclaimable_bytes: number;
    reclaimed_bytes: number;
    failures: number;
}

export interface SerializedReport {
    mode: ExecutionMode;
    keep_sdk_count: number;
    developer_root: string | null;
    sdks: SdkReportRow[];
    caches: CacheReportRow[];
    totals: ReportTotals;
}

function sdkRow(result: ExecutionResult): SdkReportRow {
    const { candidate, rank, action } = result.decision;
    return {
        platform: candidate.platform,
        path: candidate.path,
        rawName: candidate.rawName,
        version: formatVersion(candidate.version),
        rank,
        action,
        result: result.outcome,
        size_bytes: result.sizeBytes,
        ...(result.reason ? { reason: result.reason } : {}),
    };
}

function cacheRow(result: CacheCleanResult): CacheReportRow {
    return {
        category: result.target.category,
        label: result.target.label,
        path: result.target.path,
        result: result.outcome,
        size_bytes: result.sizeBytes,
        ...(result.reason ? { reason: result.reason } : {}),
    };
}

/**
 * Sum sizes per outcome across SDK and cache results
 */
export function computeTotals(report: SweepReport): ReportTotals {
    const rows = [...report.sdks, ...report.caches];
    const sum = (outcome: ExecutionOutcome) =>
        rows.filter((r) => r.outcome === outcome).reduce((total, r) => total + (r.sizeBytes ?? 0), 0);
    return {
        reclaimable_bytes: sum(ExecutionOutcome.WOULD_REMOVE),
        reclaimed_bytes: sum(ExecutionOutcome.SUCCEEDED),
        failures: rows.filter((r) => r.outcome === ExecutionOutcome.FAILED).length,
    };
}

/**
 * Plain, serializable form of a run report for JSON/YAML output
 */
export function serializeReport(report: SweepReport): SerializedReport {
    return {
        mode: report.mode,
        keep_sdk_count: report.keepSdkCount,
        developer_root: report.developerRoot,
        sdks: report.sdks.map(sdkRow),
        caches: report.caches.map(cacheRow),
        totals: computeTotals(report),
    };
}

/**
 * SDK retention plan grouped by platform, in rank order
 */
export function formatSdkTable(results: readonly ExecutionResult[]): string[] {
    const lines: string[] = [chalk.bold.cyan('\nSDK Retention\n')];
    if (!results.length) {
        lines.push(chalk.gray('No SDK bundles found.'));
        return lines;
    }

    let platform: string | null = null;
    for (const result of results) {
        const { candidate, rank, action } = result.decision;
        if (candidate.platform !== platform) {
            platform = candidate.platform;
            lines.push(chalk.bold(`\n${platform}`));
            lines.push('─'.repeat(80));
        }
        const colorFn = getOutcomeColor(result.outcome);
        const size = (result.outcome === ExecutionOutcome.SKIPPED_KEPT ? '-' : sizeText(result.sizeBytes)).padEnd(10);
        const reason = result.reason ? chalk.red(` (${result.reason})`) : '';
        lines.push(
            `  #${String(rank).padEnd(3)} ${colorFn(action.padEnd(7))} ${candidate.rawName.padEnd(24)} ` +
            `${formatVersion(candidate.version).padEnd(8)} ${chalk.yellow(size)} ${colorFn(formatOutcome(result.outcome))}${reason}`,
        );
    }
    return lines;
}

/**
 * Cache cleanup results grouped by category
 */
export function formatCacheTable(results: readonly CacheCleanResult[]): string[] {
    const lines: string[] = [chalk.bold.cyan('\nCaches\n')];
    if (!results.length) {
        lines.push(chalk.gray('No cache targets selected.'));
        return lines;
    }

    const byCategory = new Map<string, CacheCleanResult[]>();
    for (const result of results) {
        const items = byCategory.get(result.target.category) || [];
        items.push(result);
        byCategory.set(result.target.category, items);
    }

    for (const [category, items] of byCategory) {
        lines.push(chalk.bold(`\n${category}`));
        lines.push('─'.repeat(80));
        for (const item of items) {
            const colorFn = getOutcomeColor(item.outcome);
            const size = sizeText(item.sizeBytes).padEnd(10);
            const reason = item.reason ? chalk.red(` (${item.reason})`) : '';
            lines.push(
                `  ${colorFn('•')} ${item.target.label.padEnd(28)} ${chalk.yellow(size)} ` +
                `${colorFn(formatOutcome(item.outcome).padEnd(14))} ${chalk.gray(truncatePath(item.target.path, 40))}${reason}`,
            );
        }
    }
    return lines;
}

/**
 * One-line summary of what was (or would be) reclaimed
 */
export function formatSummary(report: SweepReport): string {
    const totals = computeTotals(report);
    const bytes = report.mode === ExecutionMode.DRY_RUN
        ? `Estimated savings: ${formatBytes(totals.reclaimable_bytes)}`
        : `Reclaimed: ${formatBytes(totals.reclaimed_bytes)}`;
    const failures = totals.failures ? chalk.red(`, ${totals.failures} failed`) : '';
    return `${chalk.bold('Summary')} (${report.mode}): ${bytes}${failures}`;
}

/**
 * Format data as JSON
 */
export function formatAsJSON(data: unknown, pretty: boolean = true): string {
    return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as YAML
 */
export function formatAsYAML(data: unknown): string {
    return YAML.stringify(data);
}

/**
 * Render a run report in the specified format
 */
export function renderReport(report: SweepReport, format: OutputFormat): string {
    switch (format) {
        case 'table':
            return [
                ...formatSdkTable(report.sdks),
                ...(report.caches.length ? formatCacheTable(report.caches) : []),
                '',
                formatSummary(report),
                ...(report.mode === ExecutionMode.DRY_RUN
                    ? [chalk.gray('Dry run: nothing was deleted. Re-run with --apply to remove files.')]
                    : []),
            ].join('\n');
        case 'yaml':
            return formatAsYAML(serializeReport(report));
        case 'json':
        default:
            return formatAsJSON(serializeReport(report));
    }
}

