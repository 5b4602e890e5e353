import { Command, Option } from 'commander';
import chalk from 'chalk';
import { runSweep, SweepDeps, SweepOptions } from '../core/sweep';
import { SweepReport } from '../types';
import { JsonlAuditSink } from '../utils/audit-log';
import { DevSweepConfig, generateExampleConfig, loadConfig, mergeWithCliOptions, ResolvedConfig, resolveConfig } from '../utils/config';
import { renderReport } from '../utils/formatter';
import { Logger, LogLevel, logger as defaultLogger } from '../utils/logger';

export const VERSION = '1.0.0';

type GlobalOptions = {
	quiet: boolean;
	verbose: boolean;
	format?: string;
	log?: string;
	audit?: string;
};

interface SdksOptions {
	apply: boolean;
	dryRun?: boolean;
	keepSdkCount?: number;
	developerRoot?: string;
}

interface CleanOptions extends SdksOptions {
	targets?: string;
	projectRoot?: string;
}

export interface CliDeps {
	logger?: Logger;
	cwd?: string;
	print?: (text: string) => void;
	sweep?: (config: ResolvedConfig, deps: SweepDeps, options: SweepOptions) => Promise<SweepReport>;
}

// plain decimal digits only; anything else is left for resolveConfig to reject
function parseCount(value: string): number {
	const trimmed = value.trim();
	return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

function resolveModeFlag(opts: SdksOptions): string | undefined {
	if (opts.apply) return 'apply';
	return opts.dryRun ? 'dry-run' : undefined;
}

function dryRunOption(): Option {
	return new Option('--dry-run', 'Only report, even if a config file sets mode: apply').conflicts('apply');
}

function toConfig(globals: GlobalOptions, opts: CleanOptions): DevSweepConfig {
	return {
		keepSdkCount: opts.keepSdkCount,
		mode: resolveModeFlag(opts),
		targets: opts.targets?.split(','),
		projectRoot: opts.projectRoot,
		developerRoot: opts.developerRoot,
		logFile: globals.log,
		auditFile: globals.audit,
		format: globals.format,
		quiet: globals.quiet || undefined,
		verbose: globals.verbose || undefined,
	};
}

export function buildProgram(deps: CliDeps = {}): Command {
	const log = deps.logger ?? defaultLogger;
	const cwd = deps.cwd ?? process.cwd();
	const print = deps.print ?? ((text: string) => console.log(text));
	const sweep = deps.sweep ?? runSweep;

	const execute = async (globals: GlobalOptions, opts: CleanOptions, options: SweepOptions): Promise<SweepReport> => {
		const { config: fileConfig, source } = loadConfig(cwd);
		// validation failures stop here, before anything is touched
		const config = resolveConfig(mergeWithCliOptions(fileConfig, toConfig(globals, opts)), cwd);

		if (config.verbose) log.setLevel(LogLevel.DEBUG);
		else if (config.quiet) log.setLevel(LogLevel.WARN);
		log.attachFile(config.logFile);
		log.info(`Logfile: ${config.logFile}`);
		if (source) log.debug(`Config: ${source}`);

		const audit = new JsonlAuditSink(config.auditFile);
		const report = await sweep(config, { audit, logger: log }, options);

		print(renderReport(report, config.format));
		log.info(`Audit log saved to: ${config.auditFile}`);
		return report;
	};

	const program = new Command();
	program
		.name('devsweep')
		.description('Reclaim disk space from developer caches and stale Xcode SDKs (dry-run by default)')
		.version(VERSION)
		.option('-q, --quiet', 'Minimal output', false)
		.option('-v, --verbose', 'Verbose logging', false)
		.option('-f, --format <format>', 'Output format: table|json|yaml')
		.option('--log <path>', 'Plain-text log file (default in /tmp)')
		.option('--audit <path>', 'JSON-lines audit file (default next to the log file)');

	program.hook('preAction', (_, actionCommand) => {
		const opts = actionCommand.optsWithGlobals<GlobalOptions>();
		if (opts.verbose) log.setLevel(LogLevel.DEBUG);
	});

	program
		.command('sdks')
		.description('Keep the newest N SDKs per Xcode platform and remove the rest')
		.option('--apply', 'Actually delete (default is dry-run)', false)
		.addOption(dryRunOption())
		.option('-k, --keep-sdk-count <n>', 'Newest SDKs to keep per platform', parseCount)
		.option('--developer-root <path>', 'Toolchain root (default: xcode-select -p)')
		.action(async (opts: SdksOptions, cmd: Command) => {
			await execute(cmd.optsWithGlobals<GlobalOptions>(), opts, { sdksOnly: true });
		});

	program
		.command('clean')
		.description('Clean the selected cache categories; the xcode target includes SDK retention')
		.option('--apply', 'Actually delete (default is dry-run)', false)
		.addOption(dryRunOption())
		.option('-t, --targets <list>', 'Comma-separated: all,xcode,node,python,java,homebrew')
		.option('-p, --project-root <path>', 'Root for node_modules and __pycache__ cleanup')
		.option('-k, --keep-sdk-count <n>', 'Newest SDKs to keep per platform', parseCount)
		.option('--developer-root <path>', 'Toolchain root (default: xcode-select -p)')
		.action(async (opts: CleanOptions, cmd: Command) => {
			await execute(cmd.optsWithGlobals<GlobalOptions>(), opts, {});
		});

	program
		.command('init')
		.description('Print an example .devsweeprc.yaml')
		.action(() => {
			print(generateExampleConfig());
			log.info(chalk.gray('Save it as .devsweeprc.yaml in your project root.'));
		});

	return program;
}
