import { isWindowsPlatform } from '../config/app-config.js';
import { setEnvForPackages } from '../services/env-composer.js';
import { inspectPackages, verifyRequiredPackages } from '../services/package-verifier.js';
import type { PackageViolation, VerificationOutcome } from '../types/packages.js';
import { createRuntimeContext } from './context.js';
import type { RuntimeContext } from './context.js';
import { EXIT_INTERNAL_ERROR, EXIT_OK, EXIT_USER_ERROR, isConfigurationError, safeError } from './errors.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: hdlpkg [command] [options]

Commands:
  env                 Show the package environment and apply it
  check <package...>  Set the environment and verify the named packages
  packages --list     Show the status of every package for this platform

Options:
  --help, -h          Show this help message
  --verbose, -v       Print the environment mutations before applying them (check only)

Examples:
  hdlpkg env
  hdlpkg check oss-cad-suite
  hdlpkg check oss-cad-suite examples --verbose
  hdlpkg packages --list
`.trim();

const KNOWN_COMMANDS = new Set(['env', 'check', 'packages']);

function isVerbose(argv: string[]): boolean {
  return argv.includes('--verbose') || argv.includes('-v');
}

function printViolation(violation: PackageViolation): void {
  console.error(`Error: ${violation.message}`);
  console.error(violation.remediation);
}

function formatOutcome(outcome: VerificationOutcome, context: RuntimeContext): string {
  switch (outcome.kind) {
    case 'satisfied': {
      const version = context.profile.getInstalledVersion(outcome.packageName) ?? '?';
      return `  ✓ ${outcome.packageName}: installed (${version})`;
    }
    case 'not-installed':
      return `  ✗ ${outcome.packageName}: not installed`;
    case 'version-mismatch':
      return `  ✗ ${outcome.packageName}: version ${outcome.installed} does not match ${outcome.required}`;
    case 'directory-missing':
      return `  ✗ ${outcome.packageName}: installed but missing (${outcome.path})`;
  }
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h`.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = EXIT_OK;
  return true;
}

/** Handle `env`: print the pending mutations, then apply them. */
export function handleEnvCli(argv: string[], context: RuntimeContext): boolean {
  if (argv[0] !== 'env') return false;

  setEnvForPackages(context.resources, {
    guard: context.guard,
    ambient: context.ambient,
    verbose: true,
    windows: isWindowsPlatform(context.config.platform),
    logger: context.logger,
  });
  process.exitCode = EXIT_OK;
  return true;
}

/**
 * Handle `check <package...>`.
 * Sets the environment, then stops at the first package that is unusable and
 * prints its remediation hint.
 */
export function handleCheckCli(argv: string[], context: RuntimeContext): boolean {
  if (argv[0] !== 'check') return false;

  const names = argv.slice(1).filter((arg) => !arg.startsWith('-'));
  if (names.length === 0) {
    console.error('[hdlpkg] check requires at least one package name.');
    process.exitCode = EXIT_USER_ERROR;
    return true;
  }

  setEnvForPackages(context.resources, {
    guard: context.guard,
    ambient: context.ambient,
    verbose: isVerbose(argv),
    windows: isWindowsPlatform(context.config.platform),
    logger: context.logger,
  });

  const result = verifyRequiredPackages(names, context.resources, context.profile.packages, {
    logger: context.logger,
  });
  if (!result.ok) {
    printViolation(result.violation);
    process.exitCode = EXIT_USER_ERROR;
    return true;
  }

  console.log(`Verified ${result.checked.length} package(s): ${result.checked.join(', ') || '(none)'}.`);
  process.exitCode = EXIT_OK;
  return true;
}

/** Handle `packages --list`. Exit code 1 when any package is unusable. */
export function handlePackagesCli(argv: string[], context: RuntimeContext): boolean {
  if (argv[0] !== 'packages') return false;

  if (!argv.includes('--list')) {
    console.error('[hdlpkg] Only `packages --list` is supported.');
    process.exitCode = EXIT_USER_ERROR;
    return true;
  }

  const outcomes = inspectPackages(context.resources, context.profile.packages, {
    logger: context.logger,
  });
  console.log(`Packages for ${context.config.platform}:`);
  for (const outcome of outcomes) {
    console.log(formatOutcome(outcome, context));
  }

  const failed = outcomes.filter((outcome) => outcome.kind !== 'satisfied').length;
  process.exitCode = failed > 0 ? EXIT_USER_ERROR : EXIT_OK;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = argv[0];
  if (command !== undefined && KNOWN_COMMANDS.has(command)) return false;

  if (command === undefined) {
    console.error('[hdlpkg] No command given.');
  } else {
    console.error(`[hdlpkg] Unknown command: '${command}'`);
  }
  console.error(`Run 'hdlpkg --help' to see available commands.`);
  process.exitCode = EXIT_USER_ERROR;
  return true;
}

/**
 * Single top-level handler: dispatches the command and maps every failure to
 * an exit code. Configuration errors exit with {@link EXIT_INTERNAL_ERROR}.
 */
export function runCli(
  argv: string[],
  createContext: () => RuntimeContext = () => createRuntimeContext(),
): number {
  if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
    return process.exitCode === undefined ? EXIT_OK : Number(process.exitCode);
  }

  try {
    const context = createContext();
    if (!handleEnvCli(argv, context) && !handleCheckCli(argv, context)) {
      handlePackagesCli(argv, context);
    }
  } catch (error) {
    if (!isConfigurationError(error)) {
      throw error;
    }
    console.error(`[hdlpkg] Internal error (${error.code}): ${safeError(error)}`);
    process.exitCode = EXIT_INTERNAL_ERROR;
  }

  return process.exitCode === undefined ? EXIT_OK : Number(process.exitCode);
}
