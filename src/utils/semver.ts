import type { VersionComparator, VersionConstraint } from '../types/packages.js';

const SEMVER_REGEX = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?$/;
const PARTIAL_REGEX = /^(\d+)(?:\.(\d+)(?:\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?)?)?$/;
const OPERATORS = ['>=', '<=', '~=', '==', '!=', '>', '<', '=', '^', '~'] as const;

export interface ParsedSemver {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
}

function toParsed(match: RegExpExecArray): ParsedSemver {
  return {
    major: Number(match[1]),
    minor: Number(match[2] ?? 0),
    patch: Number(match[3] ?? 0),
    prerelease: match[4] ? match[4].split('.') : [],
  };
}

/** Strict parse of an installed version. Returns null for anything that is not MAJOR.MINOR.PATCH. */
export function parseSemver(version: string): ParsedSemver | null {
  const normalized = version.trim().replace(/^v/, '');
  const match = SEMVER_REGEX.exec(normalized);
  return match ? toParsed(match) : null;
}

/** The last part a range operand spells out. */
type Precision = 'major' | 'minor' | 'patch';

interface RangeBase {
  target: ParsedSemver;
  precision: Precision;
}

/** Range operands may omit minor and patch; `1.2` widens to every `1.2.x`. */
function parseRangeBase(rangeValue: string): RangeBase {
  const match = PARTIAL_REGEX.exec(rangeValue.trim().replace(/^v/, ''));
  if (!match) {
    throw new Error(`Invalid semver range token '${rangeValue}'.`);
  }
  const precision: Precision = match[3] !== undefined ? 'patch' : match[2] !== undefined ? 'minor' : 'major';
  return { target: toParsed(match), precision };
}

function bump(version: ParsedSemver, part: Precision): ParsedSemver {
  switch (part) {
    case 'major':
      return { major: version.major + 1, minor: 0, patch: 0, prerelease: [] };
    case 'minor':
      return { major: version.major, minor: version.minor + 1, patch: 0, prerelease: [] };
    case 'patch':
      return { major: version.major, minor: version.minor, patch: version.patch + 1, prerelease: [] };
  }
}

function compareIdentifiers(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) return Number(a) - Number(b);
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareParsedVersion(a: ParsedSemver, b: ParsedSemver): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;

  // A version without pre-release identifiers ranks above any pre-release of it.
  if (a.prerelease.length === 0 && b.prerelease.length === 0) return 0;
  if (a.prerelease.length === 0) return 1;
  if (b.prerelease.length === 0) return -1;

  const length = Math.min(a.prerelease.length, b.prerelease.length);
  for (let index = 0; index < length; index += 1) {
    const comparison = compareIdentifiers(a.prerelease[index] ?? '', b.prerelease[index] ?? '');
    if (comparison !== 0) return comparison;
  }
  return a.prerelease.length - b.prerelease.length;
}

function parseComparator(token: string): VersionComparator {
  if (token === '*') {
    return { operator: '*', version: '' };
  }

  for (const operator of OPERATORS) {
    if (token.startsWith(operator)) {
      const version = token.slice(operator.length);
      const base = parseRangeBase(version);
      if (operator === '~=' && base.precision === 'major') {
        throw new Error(`Invalid semver range token '${token}': '~=' needs at least MAJOR.MINOR.`);
      }
      return { operator: operator === '==' ? '=' : operator, version };
    }
  }

  parseRangeBase(token);
  return { operator: '=', version: token };
}

/**
 * Parse a range expression such as `>=0.0.1`, `>=1.2.0,<2.0.0` or `^1.4`.
 * Clauses are separated by commas and/or whitespace; all must hold.
 * Throws on an empty expression or an unparsable clause.
 */
export function parseVersionConstraint(expression: string): VersionConstraint {
  const normalized = expression.trim().replace(/(>=|<=|~=|==|!=|>|<|=|\^|~)\s+/g, '$1');
  if (normalized.length === 0) {
    throw new Error('Empty version constraint.');
  }

  const tokens = normalized.split(/[\s,]+/).filter(Boolean);
  return {
    kind: 'range',
    expression: expression.trim(),
    comparators: tokens.map((token) => parseComparator(token)),
  };
}

/** `1.2.0-rc1` is not below `1.2.0`: a pre-release of the bound itself is out. */
function lessThan(version: ParsedSemver, bound: ParsedSemver): boolean {
  if (
    version.prerelease.length > 0 &&
    bound.prerelease.length === 0 &&
    version.major === bound.major &&
    version.minor === bound.minor &&
    version.patch === bound.patch
  ) {
    return false;
  }
  return compareParsedVersion(version, bound) < 0;
}

function within(version: ParsedSemver, low: ParsedSemver, high: ParsedSemver): boolean {
  return compareParsedVersion(version, low) >= 0 && lessThan(version, high);
}

function caretCeiling({ target, precision }: RangeBase): ParsedSemver {
  if (target.major > 0) return bump(target, 'major');
  if (target.minor > 0) return bump(target, 'minor');
  return bump(target, precision);
}

function satisfiesComparator(version: ParsedSemver, comparator: VersionComparator): boolean {
  if (comparator.operator === '*') {
    return true;
  }

  const base = parseRangeBase(comparator.version);
  const { target, precision } = base;
  const partial = precision !== 'patch';
  const comparison = compareParsedVersion(version, target);
  switch (comparator.operator) {
    case '>=':
      return comparison >= 0;
    case '>':
      return partial ? compareParsedVersion(version, bump(target, precision)) >= 0 : comparison > 0;
    case '<':
      return lessThan(version, target);
    case '<=':
      return partial ? lessThan(version, bump(target, precision)) : comparison <= 0;
    case '=':
      return partial ? within(version, target, bump(target, precision)) : comparison === 0;
    case '!=':
      return partial
        ? lessThan(version, target) || compareParsedVersion(version, bump(target, precision)) >= 0
        : comparison !== 0;
    case '^':
      return within(version, target, caretCeiling(base));
    case '~':
      return within(version, target, bump(target, precision === 'major' ? 'major' : 'minor'));
    case '~=':
      return within(version, target, bump(target, partial ? 'major' : 'minor'));
  }
}

/** An installed version that does not parse never satisfies a range. */
export function satisfiesConstraint(version: string, constraint: VersionConstraint): boolean {
  const parsedVersion = parseSemver(version);
  if (!parsedVersion) {
    return false;
  }

  if (constraint.kind === 'any') {
    return true;
  }

  return constraint.comparators.every((comparator) => satisfiesComparator(parsedVersion, comparator));
}

export function describeConstraint(constraint: VersionConstraint): string {
  return constraint.kind === 'any' ? '*' : constraint.expression;
}
