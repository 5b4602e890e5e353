/**
 * Runs a full cleanup pass from a validated configuration
 */
import * as os from 'os';
import { getCleaners } from '../cleaners';
import { resolveDeveloperRoot, ResolveRootOptions, runSdkCleanup } from '../sdk';
import { CacheCleanResult, CleanupTarget, ExecutionResult, SweepReport } from '../types';
import { AuditSink } from '../utils/audit-log';
import { ResolvedConfig } from '../utils/config';
import { FileSystemOps } from '../utils/fs-ops';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface SweepDeps {
	audit: AuditSink;
	fs?: FileSystemOps;
	logger?: Logger;
	homeDir?: string;
	/** Overrides for toolchain detection (runner, PATH lookup, fallback root) */
	rootResolution?: Omit<ResolveRootOptions, 'override' | 'logger'>;
}

export interface SweepOptions {
	/** Only run the SDK retention step, ignoring cache targets */
	sdksOnly?: boolean;
}

function resolveRoot(config: ResolvedConfig, deps: SweepDeps, log: Logger): Promise<string | null> {
	return resolveDeveloperRoot({
		...deps.rootResolution,
		override: config.developerRoot,
		logger: log,
	});
}

function sdkStep(root: string | null, config: ResolvedConfig, deps: SweepDeps, log: Logger): Promise<ExecutionResult[]> {
	return runSdkCleanup({
		developerRoot: root,
		keepCount: config.keepSdkCount,
		mode: config.mode,
		audit: deps.audit,
		fs: deps.fs,
		logger: log,
	});
}

export async function runSweep(config: ResolvedConfig, deps: SweepDeps, options: SweepOptions = {}): Promise<SweepReport> {
	const log = deps.logger ?? defaultLogger;
	const context = { projectRoot: config.projectRoot, homeDir: deps.homeDir ?? os.homedir() };

	log.info('Starting devsweep');
	log.info(`Mode: ${config.mode}`);
	log.info(`SDKs to keep per platform: ${config.keepSdkCount}`);

	let developerRoot: string | null = null;
	let sdks: ExecutionResult[] = [];
	const caches: CacheCleanResult[] = [];

	if (options.sdksOnly) {
		developerRoot = await resolveRoot(config, deps, log);
		sdks = await sdkStep(developerRoot, config, deps, log);
	} else {
		log.info(`Targets: ${config.targets.join(',')}`);
		log.info(`Project root: ${config.projectRoot}`);
		for (const cleaner of getCleaners(config.targets)) {
			if (cleaner.category !== CleanupTarget.XCODE) {
				caches.push(...(await cleaner.clean(context, config.mode, deps)));
				continue;
			}
			// Xcode caches are only cleaned when a toolchain is installed
			developerRoot = await resolveRoot(config, deps, log);
			if (!developerRoot) {
				log.warn('Xcode developer path not found. Skipping Xcode cleanup.');
				continue;
			}
			caches.push(...(await cleaner.clean(context, config.mode, deps)));
			sdks = await sdkStep(developerRoot, config, deps, log);
		}
	}

	log.info('Completed selected cleanup tasks.');
	return { mode: config.mode, keepSdkCount: config.keepSdkCount, developerRoot, sdks, caches };
}
