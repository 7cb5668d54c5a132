import { statSync } from 'node:fs';
import { ConfigurationError } from '../core/errors.js';
import type {
  InstalledPackageRecord,
  PackageDirLookup,
  PackageRegistry,
  PackageViolation,
  VerificationFailure,
  VerificationOutcome,
  VerificationResult,
  VersionConstraint,
} from '../types/packages.js';
import type { Logger } from '../utils/logger.js';
import { describeConstraint, satisfiesConstraint } from '../utils/semver.js';

export type DirectoryProbe = (dirPath: string) => boolean;

export interface VerifyOptions {
  isDirectory?: DirectoryProbe;
  logger?: Logger;
}

const ANY_VERSION: VersionConstraint = { kind: 'any' };

export function directoryExists(dirPath: string): boolean {
  return statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function buildRemediation(packageName: string): string {
  return [
    'Please run:',
    `   hdlpkg packages --install --force ${packageName}`,
    'or:',
    '   hdlpkg packages --install --force',
  ].join('\n');
}

/**
 * Check one package. Rules apply in order and the first match wins: not
 * installed, version mismatch, install directory missing, satisfied.
 */
export function checkPackage(
  packageName: string,
  installedVersion: string | undefined,
  constraint: VersionConstraint,
  dirLookup: PackageDirLookup,
  isDirectory: DirectoryProbe = directoryExists,
): VerificationOutcome {
  if (installedVersion === undefined) {
    return { kind: 'not-installed', packageName };
  }

  if (!satisfiesConstraint(installedVersion, constraint)) {
    return {
      kind: 'version-mismatch',
      packageName,
      installed: installedVersion,
      required: describeConstraint(constraint),
    };
  }

  const packageDir = dirLookup(packageName);
  if (packageDir !== null && !isDirectory(packageDir)) {
    return { kind: 'directory-missing', packageName, path: packageDir };
  }

  return { kind: 'satisfied', packageName };
}

export function describeViolation(outcome: VerificationFailure): PackageViolation {
  const remediation = buildRemediation(outcome.packageName);
  switch (outcome.kind) {
    case 'not-installed':
      return {
        packageName: outcome.packageName,
        code: outcome.kind,
        message: `package '${outcome.packageName}' is not installed.`,
        remediation,
      };
    case 'version-mismatch':
      return {
        packageName: outcome.packageName,
        code: outcome.kind,
        message:
          `package '${outcome.packageName}' version ${outcome.installed} does not\n` +
          `match the requirement for version ${outcome.required}.`,
        remediation,
      };
    case 'directory-missing':
      return {
        packageName: outcome.packageName,
        code: outcome.kind,
        message: `package '${outcome.packageName}' is installed but missing.`,
        remediation,
      };
  }
}

function installedVersionOf(installed: InstalledPackageRecord, name: string): string | undefined {
  return Object.hasOwn(installed, name) ? installed[name]?.version : undefined;
}

/**
 * Verify the packages an operation needs, in the caller's order. Stops at the
 * first user-facing failure. A name missing from the catalog is a caller bug
 * and throws {@link ConfigurationError}; packages that do not apply to this
 * platform are skipped.
 */
export function verifyRequiredPackages(
  requiredNames: Iterable<string>,
  registry: PackageRegistry,
  installed: InstalledPackageRecord,
  options: VerifyOptions = {},
): VerificationResult {
  const checked: string[] = [];
  const dirLookup: PackageDirLookup = (name) => registry.getPackageDir(name);

  for (const name of requiredNames) {
    if (!registry.allPackages.has(name)) {
      throw new ConfigurationError('unknown-package', `Unknown package named [${name}]`);
    }

    if (!registry.platformPackages.has(name)) {
      options.logger?.debug(`Package '${name}' does not apply to this platform; skipping.`);
      continue;
    }

    checked.push(name);
    const outcome = checkPackage(
      name,
      installedVersionOf(installed, name),
      registry.distribution.get(name) ?? ANY_VERSION,
      dirLookup,
      options.isDirectory,
    );

    if (outcome.kind !== 'satisfied') {
      return { ok: false, checked, violation: describeViolation(outcome), outcome };
    }
  }

  return { ok: true, checked };
}

/** Outcome for every package that applies to this platform, in catalog order. */
export function inspectPackages(
  registry: PackageRegistry,
  installed: InstalledPackageRecord,
  options: VerifyOptions = {},
): VerificationOutcome[] {
  const dirLookup: PackageDirLookup = (name) => registry.getPackageDir(name);
  return [...registry.platformPackages.keys()].map((name) =>
    checkPackage(
      name,
      installedVersionOf(installed, name),
      registry.distribution.get(name) ?? ANY_VERSION,
      dirLookup,
      options.isDirectory,
    ),
  );
}
