/**
 * Configuration Loader for devsweep
 *
 * Supports loading configuration from:
 * - .devsweeprc (JSON or YAML)
 * - .devsweeprc.json
 * - .devsweeprc.yaml / .devsweeprc.yml
 * - devsweep.config.json
 * - package.json "devsweep" key
 *
 * Configuration is merged with CLI arguments (CLI takes precedence) and
 * validated before any cleanup starts.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { CleanupTarget, ExecutionMode } from '../types';
import { ConfigError, describeError } from './errors';
import { OutputFormat } from './formatter';

/**
 * devsweep configuration options, as written in a config file or passed on the command line
 */
export interface DevSweepConfig {
    /** Newest SDKs to keep per platform (default: 1) */
    keepSdkCount?: number;
    /** 'dry-run' (default) or 'apply' */
    mode?: string;
    /** Categories to clean, or 'all' */
    targets?: string[];
    /** Root for project-local caches (default: current directory) */
    projectRoot?: string;
    /** Toolchain root; detected with xcode-select when unset */
    developerRoot?: string;
    /** Plain-text log file */
    logFile?: string;
    /** JSON-lines audit file */
    auditFile?: string;
    /** Output format preference */
    format?: string;
    /** Quiet mode */
    quiet?: boolean;
    /** Verbose mode */
    verbose?: boolean;
}

/**
 * Configuration after validation, with every default filled in
 */
export interface ResolvedConfig {
    keepSdkCount: number;
    mode: ExecutionMode;
    targets: CleanupTarget[];
    projectRoot: string;
    developerRoot: string | null;
    logFile: string;
    auditFile: string;
    format: OutputFormat;
    quiet: boolean;
    verbose: boolean;
}

export const ALL_TARGETS: readonly CleanupTarget[] = [
    CleanupTarget.XCODE,
    CleanupTarget.NODE,
    CleanupTarget.PYTHON,
    CleanupTarget.JAVA,
    CleanupTarget.HOMEBREW,
];

const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml'];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: DevSweepConfig = {
    keepSdkCount: 1,
    mode: ExecutionMode.DRY_RUN,
    targets: ['all'],
    format: 'table',
    quiet: false,
    verbose: false,
};

/**
 * Configuration file search locations (in order)
 */
const CONFIG_FILES = [
    '.devsweeprc',
    '.devsweeprc.json',
    '.devsweeprc.yaml',
    '.devsweeprc.yml',
    'devsweep.config.json',
];

const PACKAGE_JSON_KEY = 'devsweep';

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * Default log path, e.g. /tmp/devsweep_20261018_142501.log
 */
export function defaultLogFile(now: Date = new Date(), dir: string = '/tmp'): string {
    const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return path.join(dir, `devsweep_${stamp}.log`);
}

export function auditFileFor(logFile: string): string {
    return logFile.endsWith('.log') ? `${logFile.slice(0, -'.log'.length)}.audit.jsonl` : `${logFile}.audit.jsonl`;
}

/**
 * Find configuration file by walking up directory tree
 */
function findConfigFile(startDir: string): string | null {
    let dir = path.resolve(startDir);

    for (;;) {
        for (const filename of CONFIG_FILES) {
            const configPath = path.join(dir, filename);
            if (fs.existsSync(configPath)) {
                return configPath;
            }
        }
        const parent = path.dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField<T>(
    raw: Record<string, unknown>,
    key: keyof DevSweepConfig,
    guard: (value: unknown) => value is T,
    expected: string,
    source: string,
): T | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (!guard(value)) {
        throw new ConfigError(`${source}: "${key}" must be ${expected}`, key);
    }
    return value;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every(isString);

/**
 * Check the shape of a parsed config object; unknown keys are ignored
 */
export function parseConfigObject(raw: unknown, source: string): DevSweepConfig {
    if (!isRecord(raw)) {
        throw new ConfigError(`${source}: configuration must be an object`);
    }
    const targets = raw.targets;
    return {
        keepSdkCount: readField(raw, 'keepSdkCount', isNumber, 'a number', source),
        mode: readField(raw, 'mode', isString, 'a string', source),
        targets: typeof targets === 'string'
            ? targets.split(',').map((t) => t.trim())
            : readField(raw, 'targets', isStringArray, 'a list of strings', source),
        projectRoot: readField(raw, 'projectRoot', isString, 'a string', source),
        developerRoot: readField(raw, 'developerRoot', isString, 'a string', source),
        logFile: readField(raw, 'logFile', isString, 'a string', source),
        auditFile: readField(raw, 'auditFile', isString, 'a string', source),
        format: readField(raw, 'format', isString, 'a string', source),
        quiet: readField(raw, 'quiet', isBoolean, 'a boolean', source),
        verbose: readField(raw, 'verbose', isBoolean, 'a boolean', source),
    };
}

function parseYaml(content: string, filepath: string): unknown {
    try {
        return yaml.parse(content);
    } catch (error) {
        throw new ConfigError(`${filepath}: invalid YAML (${describeError(error)})`);
    }
}

/**
 * Parse configuration from file content
 */
function parseConfigFile(filepath: string): DevSweepConfig {
    const content = fs.readFileSync(filepath, 'utf-8');
    const ext = path.extname(filepath).toLowerCase();

    // YAML files
    if (ext === '.yaml' || ext === '.yml') {
        return parseConfigObject(parseYaml(content, filepath), filepath);
    }

    // JSON files (including .devsweeprc without extension)
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        if (ext === '.json') {
            throw new ConfigError(`${filepath}: invalid JSON`);
        }
        // extensionless .devsweeprc may be YAML
        parsed = parseYaml(content, filepath);
    }
    return parseConfigObject(parsed, filepath);
}

/**
 * Check for devsweep key in package.json
 */
function loadFromPackageJson(startDir: string): { config: DevSweepConfig; source: string } | null {
    let dir = path.resolve(startDir);

    for (;;) {
        const pkgPath = path.join(dir, 'package.json');
        if (fs.existsSync(pkgPath)) {
            let pkg: unknown = null;
            try {
                pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
            } catch {
                // not ours to validate
            }
            if (isRecord(pkg) && pkg[PACKAGE_JSON_KEY] !== undefined) {
                return { config: parseConfigObject(pkg[PACKAGE_JSON_KEY], `${pkgPath}#${PACKAGE_JSON_KEY}`), source: pkgPath };
            }
        }
        const parent = path.dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(cwd: string = process.cwd()): { config: DevSweepConfig; source: string | null } {
    const configFile = findConfigFile(cwd);
    if (configFile) {
        return { config: mergeConfig(DEFAULT_CONFIG, parseConfigFile(configFile)), source: configFile };
    }

    const pkgConfig = loadFromPackageJson(cwd);
    if (pkgConfig) {
        return { config: mergeConfig(DEFAULT_CONFIG, pkgConfig.config), source: pkgConfig.source };
    }

    return { config: { ...DEFAULT_CONFIG }, source: null };
}

/**
 * Field-wise merge; values left undefined in the override keep the base value
 */
function mergeConfig(base: DevSweepConfig, override: DevSweepConfig): DevSweepConfig {
    return {
        keepSdkCount: override.keepSdkCount ?? base.keepSdkCount,
        mode: override.mode ?? base.mode,
        targets: override.targets ?? base.targets,
        projectRoot: override.projectRoot ?? base.projectRoot,
        developerRoot: override.developerRoot ?? base.developerRoot,
        logFile: override.logFile ?? base.logFile,
        auditFile: override.auditFile ?? base.auditFile,
        format: override.format ?? base.format,
        quiet: override.quiet ?? base.quiet,
        verbose: override.verbose ?? base.verbose,
    };
}

/**
 * Merge CLI options with loaded config (CLI takes precedence)
 */
export function mergeWithCliOptions(config: DevSweepConfig, cliOptions: DevSweepConfig): DevSweepConfig {
    return mergeConfig(config, cliOptions);
}

function resolveMode(mode: string | undefined): ExecutionMode {
    switch (mode ?? ExecutionMode.DRY_RUN) {
        case ExecutionMode.DRY_RUN:
            return ExecutionMode.DRY_RUN;
        case ExecutionMode.APPLY:
            return ExecutionMode.APPLY;
        default:
            throw new ConfigError(`Unrecognized mode "${mode}" (expected dry-run or apply)`, 'mode');
    }
}

function isCleanupTarget(value: string): value is CleanupTarget {
    return ALL_TARGETS.some((target) => target === value);
}

/**
 * Expand 'all' and reject unknown names; order follows ALL_TARGETS
 */
export function resolveTargets(targets: readonly string[]): CleanupTarget[] {
    const names = targets.map((t) => t.trim().toLowerCase()).filter(Boolean);
    if (names.length === 0) {
        throw new ConfigError('No cleanup targets selected', 'targets');
    }
    if (names.includes('all')) return [...ALL_TARGETS];

    const unknown = names.filter((name) => !isCleanupTarget(name));
    if (unknown.length > 0) {
        throw new ConfigError(
            `Unknown target(s): ${unknown.join(', ')} (expected all or ${ALL_TARGETS.join(', ')})`,
            'targets',
        );
    }
    return ALL_TARGETS.filter((target) => names.includes(target));
}

function resolveFormat(format: string | undefined): OutputFormat {
    const match = OUTPUT_FORMATS.find((f) => f === (format ?? 'table'));
    if (!match) {
        throw new ConfigError(`Unknown output format "${format}" (expected ${OUTPUT_FORMATS.join(', ')})`, 'format');
    }
    return match;
}

/**
 * Validate a merged configuration. Throws ConfigError before any cleanup work happens.
 */
export function resolveConfig(config: DevSweepConfig, cwd: string = process.cwd()): ResolvedConfig {
    const keepSdkCount = config.keepSdkCount ?? 1;
    if (!Number.isInteger(keepSdkCount) || keepSdkCount < 0) {
        throw new ConfigError(`keepSdkCount must be a non-negative integer (got ${keepSdkCount})`, 'keepSdkCount');
    }

    const logFile = config.logFile ?? defaultLogFile();
    return {
        keepSdkCount,
        mode: resolveMode(config.mode),
        targets: resolveTargets(config.targets ?? ['all']),
        projectRoot: path.resolve(cwd, config.projectRoot ?? '.'),
        developerRoot: config.developerRoot ? path.resolve(cwd, config.developerRoot) : null,
        logFile,
        auditFile: config.auditFile ?? auditFileFor(logFile),
        format: resolveFormat(config.format),
        quiet: config.quiet ?? false,
        verbose: config.verbose ?? false,
    };
}

/**
 * Generate example configuration file content
 */
export function generateExampleConfig(): string {
    return `# devsweep configuration
# Place this file as .devsweeprc.yaml in your project root

# Newest SDKs to keep per Xcode platform (default: 1, 0 removes all)
keepSdkCount: 1

# dry-run (default) or apply
mode: dry-run

# What to clean: all, or any of ${ALL_TARGETS.join(', ')}
targets:
  - all

# Root for node_modules / __pycache__ cleanup (defaults to current directory)
projectRoot: .

# Toolchain root (detected with xcode-select when omitted)
# developerRoot: /Applications/Xcode.app/Contents/Developer

# Output format: table, json, yaml
format: table

# Quiet mode (minimal output)
quiet: false

# Verbose mode (detailed output)
verbose: false
`;
}
