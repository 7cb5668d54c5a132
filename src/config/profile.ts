import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { ConfigurationError, safeError } from '../core/errors.js';
import type { InstalledPackageRecord } from '../types/packages.js';

export const PROFILE_FILE = 'profile.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function profileError(message: string): ConfigurationError {
  return new ConfigurationError('invalid-profile', message);
}

export function parseProfile(value: unknown): InstalledPackageRecord {
  if (!isRecord(value)) {
    throw profileError('Invalid profile root content.');
  }
  if (value.packages === undefined) {
    return {};
  }
  if (!isRecord(value.packages)) {
    throw profileError("Invalid profile field 'packages'.");
  }

  const packages: InstalledPackageRecord = {};
  for (const [name, entry] of Object.entries(value.packages)) {
    if (!isRecord(entry) || typeof entry.version !== 'string') {
      throw profileError(`Invalid profile entry for package '${name}'. Expected { version: string }.`);
    }
    packages[name] = { version: entry.version };
  }
  return packages;
}

/** Installed-packages record kept in `<home>/profile.json`. */
export class Profile {
  readonly packages: InstalledPackageRecord;

  constructor(packages: InstalledPackageRecord = {}) {
    this.packages = packages;
  }

  static load(homeDir: string): Profile {
    const profilePath = path.join(homeDir, PROFILE_FILE);
    if (!existsSync(profilePath)) {
      return new Profile();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(profilePath, 'utf8')) as unknown;
    } catch (error) {
      throw profileError(`Failed to read ${profilePath}: ${safeError(error)}`);
    }
    return new Profile(parseProfile(parsed));
  }

  getInstalledVersion(name: string): string | undefined {
    return Object.hasOwn(this.packages, name) ? this.packages[name]?.version : undefined;
  }
}
