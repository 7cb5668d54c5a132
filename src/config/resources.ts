import { readFileSync } from 'node:fs';
import path from 'node:path';
import { ConfigurationError, safeError } from '../core/errors.js';
import type {
  PackageDefinition,
  PackageEnvSection,
  PackageRegistry,
  VersionConstraint,
} from '../types/packages.js';
import { parseVersionConstraint } from '../utils/semver.js';
import { isPlatformId } from './app-config.js';
import type { PlatformId } from './app-config.js';

export const PACKAGES_FILE = 'packages.json';
export const DISTRIBUTION_FILE = 'distribution.json';

/** Placeholder in env values that stands for the package's install directory. */
const PACKAGE_DIR_PLACEHOLDER = '%p';

export interface ResourcesOptions {
  platform: PlatformId;
  packagesDir: string;
}

export interface LoadResourcesOptions extends ResourcesOptions {
  resourcesDir: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function catalogError(message: string): ConfigurationError {
  return new ConfigurationError('invalid-catalog', message);
}

function parseStringList(value: unknown, fieldName: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw catalogError(`Invalid catalog field '${fieldName}'. Expected string array.`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw catalogError(`Invalid catalog field '${fieldName}[${index}]'. Expected string.`);
    }
    return item;
  });
}

function parseEnvSection(value: unknown, packageName: string): PackageEnvSection | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw catalogError(`Package '${packageName}' has an invalid 'env' section.`);
  }

  const vars: Record<string, string> = {};
  if (value.vars !== undefined) {
    if (!isRecord(value.vars)) {
      throw catalogError(`Package '${packageName}' has an invalid 'env.vars' map.`);
    }
    for (const [varName, varValue] of Object.entries(value.vars)) {
      if (typeof varValue !== 'string') {
        throw catalogError(`Invalid value for '${varName}' in '${packageName}' env.vars.`);
      }
      vars[varName] = varValue;
    }
  }

  return {
    path: parseStringList(value.path, `${packageName}.env.path`),
    vars,
  };
}

function expandPlaceholder(value: string, packageDir: string | null): string {
  if (!value.includes(PACKAGE_DIR_PLACEHOLDER)) {
    return value;
  }
  if (packageDir === null) {
    throw catalogError(`Env value '${value}' references '${PACKAGE_DIR_PLACEHOLDER}' but the package has no folder.`);
  }
  return value.split(PACKAGE_DIR_PLACEHOLDER).join(packageDir);
}

function expandEnvSection(env: PackageEnvSection, packageDir: string | null): PackageEnvSection {
  const vars: Record<string, string> = {};
  for (const [varName, varValue] of Object.entries(env.vars)) {
    vars[varName] = expandPlaceholder(varValue, packageDir);
  }
  return {
    path: env.path.map((entry) => expandPlaceholder(entry, packageDir)),
    vars,
  };
}

function parseFolderName(value: unknown, packageName: string): string | null {
  if (value === undefined) {
    return packageName;
  }
  if (value === null) {
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw catalogError(`Package '${packageName}' has an invalid 'folder_name'.`);
  }
  return value.trim();
}

function parseCatalog(value: unknown, options: ResourcesOptions): PackageDefinition[] {
  if (!isRecord(value) || !isRecord(value.packages)) {
    throw catalogError("Invalid package catalog. Expected object with 'packages' map.");
  }

  const definitions: PackageDefinition[] = [];
  for (const [name, entry] of Object.entries(value.packages)) {
    if (!isRecord(entry)) {
      throw catalogError(`Invalid catalog entry '${name}'.`);
    }

    const restrictedTo = parseStringList(entry.restricted_to_platforms, `${name}.restricted_to_platforms`);
    for (const platform of restrictedTo) {
      if (!isPlatformId(platform)) {
        throw catalogError(`Package '${name}' names unknown platform '${platform}'.`);
      }
    }

    const folderName = parseFolderName(entry.folder_name, name);
    const packageDir = folderName === null ? null : path.join(options.packagesDir, folderName);
    const env = parseEnvSection(entry.env, name);

    definitions.push({
      name,
      description: typeof entry.description === 'string' ? entry.description : '',
      platformMatch: restrictedTo.length === 0 || restrictedTo.includes(options.platform),
      folderName,
      env: env === undefined ? undefined : expandEnvSection(env, packageDir),
    });
  }

  return definitions;
}

function parseDistribution(value: unknown): Map<string, VersionConstraint> {
  if (!isRecord(value) || !isRecord(value.packages)) {
    throw new ConfigurationError(
      'invalid-distribution',
      "Invalid distribution. Expected object with 'packages' map.",
    );
  }

  const distribution = new Map<string, VersionConstraint>();
  for (const [name, expression] of Object.entries(value.packages)) {
    if (typeof expression !== 'string') {
      throw new ConfigurationError(
        'invalid-distribution',
        `Distribution constraint for '${name}' must be a string.`,
      );
    }
    try {
      distribution.set(name, parseVersionConstraint(expression));
    } catch (error) {
      throw new ConfigurationError(
        'invalid-distribution',
        `Distribution constraint for '${name}' is malformed: ${safeError(error)}`,
      );
    }
  }
  return distribution;
}

function readJsonFile(filePath: string, code: 'invalid-catalog' | 'invalid-distribution'): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf8')) as unknown;
  } catch (error) {
    throw new ConfigurationError(code, `Failed to read ${filePath}: ${safeError(error)}`);
  }
}

/**
 * Package catalog and distribution constraints, resolved for one platform
 * and one packages directory.
 */
export class Resources implements PackageRegistry {
  readonly platformPackages: ReadonlyMap<string, PackageDefinition>;
  readonly allPackages: ReadonlySet<string>;
  readonly distribution: ReadonlyMap<string, VersionConstraint>;
  readonly #packagesDir: string;

  constructor(catalog: unknown, distribution: unknown, options: ResourcesOptions) {
    const definitions = parseCatalog(catalog, options);
    this.allPackages = new Set(definitions.map((definition) => definition.name));
    this.platformPackages = new Map(
      definitions
        .filter((definition) => definition.platformMatch)
        .map((definition) => [definition.name, definition] as const),
    );
    this.distribution = parseDistribution(distribution);
    this.#packagesDir = options.packagesDir;
  }

  static load(options: LoadResourcesOptions): Resources {
    const catalog = readJsonFile(path.join(options.resourcesDir, PACKAGES_FILE), 'invalid-catalog');
    const distribution = readJsonFile(
      path.join(options.resourcesDir, DISTRIBUTION_FILE),
      'invalid-distribution',
    );
    return new Resources(catalog, distribution, options);
  }

  /** Install directory of a platform package, or null when it has none here. */
  getPackageDir(name: string): string | null {
    const definition = this.platformPackages.get(name);
    if (!definition || definition.folderName === null) {
      return null;
    }
    return path.join(this.#packagesDir, definition.folderName);
  }
}
