/**
 * Toolchain root resolution and SDK bundle discovery
 *
 * Layout walked: `<developerRoot>/Platforms/<Name>.platform/Developer/SDKs/<Name><version>.sdk`
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import { DiscoveredSdk, SdkCandidate } from '../types';
import { CommandRunner, resolveFromPATH, runCommand } from '../utils/core-utils';
import { describeError } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { parseVersion, SDK_BUNDLE_SUFFIX } from './version-parser';

export const DEFAULT_DEVELOPER_ROOT = '/Applications/Xcode.app/Contents/Developer';
export const PLATFORMS_DIR = 'Platforms';
export const SDKS_SUBPATH = path.join('Developer', 'SDKs');
const PLATFORM_SUFFIX = '.platform';

export interface ResolveRootOptions {
  /** Explicit root from configuration; wins over detection */
  override?: string | null;
  runner?: CommandRunner;
  /** Lookup for the `xcode-select` binary; null means it is not installed */
  which?: (name: string) => string | null;
  fallbackRoot?: string;
  logger?: Logger;
}

/**
 * Find the active developer directory. Returns null when no toolchain is installed.
 */
export async function resolveDeveloperRoot(options: ResolveRootOptions = {}): Promise<string | null> {
  const log = options.logger ?? defaultLogger;
  if (options.override) return options.override;

  const which = options.which ?? ((name: string) => resolveFromPATH(name));
  const runner = options.runner ?? runCommand;
  if (which('xcode-select')) {
    try {
      const res = await runner('xcode-select', ['-p']);
      const selected = res.stdout.trim();
      if (res.code === 0 && selected) return selected;
      log.debug(`xcode-select -p exited with ${res.code}`);
    } catch (error) {
      log.debug(`xcode-select -p failed: ${describeError(error)}`);
    }
  }

  const fallback = options.fallbackRoot ?? DEFAULT_DEVELOPER_ROOT;
  if (await fs.pathExists(fallback)) return fallback;
  return null;
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

function platformName(dirName: string): string {
  return dirName.endsWith(PLATFORM_SUFFIX) ? dirName.slice(0, -PLATFORM_SUFFIX.length) : dirName;
}

/**
 * Enumerate SDK bundle directories per platform. A missing root yields an empty list.
 * Symlinked bundles (aliases such as `iPhoneOS.sdk`) are not real directories and are ignored.
 */
export async function discoverSdks(developerRoot: string | null | undefined): Promise<DiscoveredSdk[]> {
  if (!developerRoot) return [];

  const platformsDir = path.join(developerRoot, PLATFORMS_DIR);
  const sdks: DiscoveredSdk[] = [];

  for (const platformDir of await listDirectories(platformsDir)) {
    const sdksDir = path.join(platformsDir, platformDir, SDKS_SUBPATH);
    for (const bundle of await listDirectories(sdksDir)) {
      if (!bundle.endsWith(SDK_BUNDLE_SUFFIX)) continue;
      sdks.push({
        platform: platformName(platformDir),
        path: path.join(sdksDir, bundle),
        rawName: bundle,
      });
    }
  }

  return sdks;
}

/**
 * Discovery with the version parser applied in the same stage
 */
export async function discoverSdkCandidates(developerRoot: string | null | undefined): Promise<SdkCandidate[]> {
  const sdks = await discoverSdks(developerRoot);
  return sdks.map((sdk) => ({ ...sdk, version: parseVersion(sdk.rawName) }));
}
