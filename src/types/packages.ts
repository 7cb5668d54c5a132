export interface PackageEnvSection {
  path: string[];
  vars: Record<string, string>;
}

export interface PackageDefinition {
  name: string;
  description: string;
  /** True when the package applies to the current platform. */
  platformMatch: boolean;
  /** Directory name under the packages dir, or null when the package has no files. */
  folderName: string | null;
  /** Required on every catalog entry, even when empty. */
  env?: PackageEnvSection;
}

export interface VersionComparator {
  operator: '>=' | '>' | '<=' | '<' | '=' | '!=' | '^' | '~' | '~=' | '*';
  version: string;
}

export type VersionConstraint =
  | { kind: 'any' }
  | { kind: 'range'; expression: string; comparators: VersionComparator[] };

/** Ordered view of the package catalog as seen from the current platform. */
export interface PackageRegistry {
  /** Platform-applicable packages, in catalog declaration order. */
  platformPackages: ReadonlyMap<string, PackageDefinition>;
  /** Every package name known to the catalog, applicable or not. */
  allPackages: ReadonlySet<string>;
  distribution: ReadonlyMap<string, VersionConstraint>;
  getPackageDir(name: string): string | null;
}

export interface InstalledPackageEntry {
  version: string;
}

export type InstalledPackageRecord = Record<string, InstalledPackageEntry>;

export interface EnvMutations {
  readonly paths: readonly string[];
  readonly vars: readonly (readonly [name: string, value: string])[];
}

export type VerificationFailureKind = 'not-installed' | 'version-mismatch' | 'directory-missing';

export type VerificationOutcome =
  | { kind: 'satisfied'; packageName: string }
  | { kind: 'not-installed'; packageName: string }
  | { kind: 'version-mismatch'; packageName: string; installed: string; required: string }
  | { kind: 'directory-missing'; packageName: string; path: string };

export type VerificationFailure = Exclude<VerificationOutcome, { kind: 'satisfied' }>;

export interface PackageViolation {
  packageName: string;
  code: VerificationFailureKind;
  message: string;
  remediation: string;
}

export type VerificationResult =
  | { ok: true; checked: string[] }
  | { ok: false; checked: string[]; violation: PackageViolation; outcome: VerificationFailure };

export type PackageDirLookup = (name: string) => string | null;
