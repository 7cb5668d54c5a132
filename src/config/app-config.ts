import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../core/errors.js';
import { isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

export type PlatformId =
  | 'darwin_x86_64'
  | 'darwin_arm64'
  | 'linux_x86_64'
  | 'linux_aarch64'
  | 'linux_armv7l'
  | 'windows_amd64';

const PLATFORM_IDS: ReadonlySet<string> = new Set<PlatformId>([
  'darwin_x86_64',
  'darwin_arm64',
  'linux_x86_64',
  'linux_aarch64',
  'linux_armv7l',
  'windows_amd64',
]);

const HOST_PLATFORMS: Record<string, PlatformId> = {
  'darwin:x64': 'darwin_x86_64',
  'darwin:arm64': 'darwin_arm64',
  'linux:x64': 'linux_x86_64',
  'linux:arm64': 'linux_aarch64',
  'linux:arm': 'linux_armv7l',
  'win32:x64': 'windows_amd64',
};

export const DEFAULT_RESOURCES_DIR = fileURLToPath(new URL('../../resources', import.meta.url));

export interface AppConfig {
  homeDir: string;
  packagesDir: string;
  resourcesDir: string;
  platform: PlatformId;
  logLevel: LogLevel;
}

export function isPlatformId(value: string): value is PlatformId {
  return PLATFORM_IDS.has(value);
}

export function isWindowsPlatform(platform: PlatformId): boolean {
  return platform.startsWith('windows_');
}

export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): PlatformId {
  const detected = HOST_PLATFORMS[`${platform}:${arch}`];
  if (!detected) {
    throw new ConfigurationError(
      'unsupported-platform',
      `Unsupported host platform '${platform}' with architecture '${arch}'.`,
    );
  }
  return detected;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return undefined;
  }
  return raw.trim();
}

/**
 * Resolve runtime configuration from `HDLPKG_*` variables.
 * The CLI entry point loads `.env` into `process.env` before calling this.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const homeDir = path.resolve(readEnv(env, 'HDLPKG_HOME_DIR') ?? path.join(os.homedir(), '.hdlpkg'));
  const packagesDir = path.resolve(readEnv(env, 'HDLPKG_PACKAGES_DIR') ?? path.join(homeDir, 'packages'));
  const resourcesDir = path.resolve(readEnv(env, 'HDLPKG_RESOURCES_DIR') ?? DEFAULT_RESOURCES_DIR);

  const platformOverride = readEnv(env, 'HDLPKG_PLATFORM');
  let platform: PlatformId;
  if (platformOverride === undefined) {
    platform = detectPlatform();
  } else if (isPlatformId(platformOverride)) {
    platform = platformOverride;
  } else {
    throw new ConfigurationError(
      'unsupported-platform',
      `HDLPKG_PLATFORM must be one of ${[...PLATFORM_IDS].join(', ')}, got '${platformOverride}'.`,
    );
  }

  const levelValue = readEnv(env, 'HDLPKG_LOG_LEVEL') ?? 'warn';

  return {
    homeDir,
    packagesDir,
    resourcesDir,
    platform,
    logLevel: isLogLevel(levelValue) ? levelValue : 'warn',
  };
}
