import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Profile } from '../../src/config/profile.js';
import { Resources } from '../../src/config/resources.js';
import type { RuntimeContext } from '../../src/core/context.js';
import {
    handleCheckCli,
    handleHelpCli,
    handleUnknownCommand,
    runCli,
} from '../../src/core/cli.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { EnvironmentGuard } from '../../src/services/env-composer.js';

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];
let tempDir: string;
let packagesDir: string;

const catalog = {
    packages: {
        'oss-cad-suite': {
            folder_name: 'tools-oss-cad-suite',
            env: { path: ['%p/bin'], vars: { VERILATOR_ROOT: '%p/share/verilator' } },
        },
        verible: { env: { path: ['%p/bin'] } },
        drivers: { restricted_to_platforms: ['windows_amd64'], env: { path: ['%p/bin'] } },
    },
};

const distribution = {
    packages: {
        'oss-cad-suite': '>=0.2.0,<0.3.0',
        verible: '^0.0.3',
    },
};

const silentLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
};

const makeContext = (installed: Record<string, { version: string }> = {}): RuntimeContext => ({
    config: {
        homeDir: tempDir,
        packagesDir,
        resourcesDir: tempDir,
        platform: 'linux_x86_64',
        logLevel: 'warn',
    },
    resources: new Resources(catalog, distribution, { platform: 'linux_x86_64', packagesDir }),
    profile: new Profile(installed),
    guard: new EnvironmentGuard(),
    logger: silentLogger,
    ambient: { PATH: '/usr/bin' },
});

beforeEach(async () => {
    consoleOutput = [];
    consoleErrors = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => {
        consoleOutput.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args) => {
        consoleErrors.push(args.join(' '));
    });
    process.exitCode = undefined;

    tempDir = await mkdtemp(path.join(os.tmpdir(), 'hdlpkg-cli-'));
    packagesDir = path.join(tempDir, 'packages');
    await mkdir(path.join(packagesDir, 'tools-oss-cad-suite'), { recursive: true });
});

afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
    it('returns false when --help is not present', () => {
        expect(handleHelpCli([])).toBe(false);
        expect(handleHelpCli(['check', 'verible'])).toBe(false);
    });

    it('prints usage for -h', () => {
        expect(handleHelpCli(['-h'])).toBe(true);
        expect(consoleOutput[0]?.startsWith('Usage: hdlpkg [command] [options]')).toBe(true);
        expect(process.exitCode).toBe(0);
    });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
    it('lets known commands through', () => {
        expect(handleUnknownCommand(['check', 'verible'])).toBe(false);
        expect(handleUnknownCommand(['env'])).toBe(false);
    });

    it('rejects a missing or unknown command', () => {
        expect(handleUnknownCommand([])).toBe(true);
        expect(handleUnknownCommand(['build'])).toBe(true);
        expect(consoleErrors).toEqual([
            '[hdlpkg] No command given.',
            "Run 'hdlpkg --help' to see available commands.",
            "[hdlpkg] Unknown command: 'build'",
            "Run 'hdlpkg --help' to see available commands.",
        ]);
        expect(process.exitCode).toBe(1);
    });
});

// ── check ────────────────────────────────────────────────────────────────────

describe('check', () => {
    it('sets the environment and verifies installed packages', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.2.1' } });

        expect(runCli(['check', 'oss-cad-suite'], () => context)).toBe(0);
        expect(consoleOutput).toEqual(['Setting the environment.', 'Verified 1 package(s): oss-cad-suite.']);

        const suiteDir = path.join(packagesDir, 'tools-oss-cad-suite');
        expect(context.ambient.PATH).toBe(`${suiteDir}/bin:${path.join(packagesDir, 'verible')}/bin:/usr/bin`);
        expect(context.ambient.VERILATOR_ROOT).toBe(`${suiteDir}/share/verilator`);
    });

    it('applies the environment once across repeated checks', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.2.1' } });

        handleCheckCli(['check', 'oss-cad-suite'], context);
        const pathAfterFirst = context.ambient.PATH;
        handleCheckCli(['check', 'oss-cad-suite'], context);

        expect(context.ambient.PATH).toBe(pathAfterFirst);
        expect(consoleOutput.filter((line) => line === 'Setting the environment.')).toHaveLength(1);
    });

    it('prints the first violation with a reinstall hint and exits 1', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.1.9' } });

        expect(runCli(['check', 'verible', 'oss-cad-suite'], () => context)).toBe(1);
        expect(consoleErrors).toEqual([
            "Error: package 'verible' is not installed.",
            'Please run:\n   hdlpkg packages --install --force verible\nor:\n   hdlpkg packages --install --force',
        ]);
    });

    it('reports a version mismatch', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.3.0' } });

        expect(runCli(['check', 'oss-cad-suite'], () => context)).toBe(1);
        expect(consoleErrors[0]).toBe(
            "Error: package 'oss-cad-suite' version 0.3.0 does not\nmatch the requirement for version >=0.2.0,<0.3.0.",
        );
    });

    it('reports a missing install directory', () => {
        const context = makeContext({ verible: { version: '0.0.3' } });

        expect(runCli(['check', 'verible'], () => context)).toBe(1);
        expect(consoleErrors[0]).toBe("Error: package 'verible' is installed but missing.");
    });

    it('skips packages for other platforms', () => {
        expect(runCli(['check', 'drivers'], () => makeContext())).toBe(0);
        expect(consoleOutput[1]).toBe('Verified 0 package(s): (none).');
    });

    it('exits 2 for a package outside the catalog', () => {
        expect(runCli(['check', 'nope'], () => makeContext())).toBe(2);
        expect(consoleErrors).toEqual(['[hdlpkg] Internal error (unknown-package): Unknown package named [nope]']);
    });

    it('requires a package name', () => {
        expect(runCli(['check'], () => makeContext())).toBe(1);
        expect(consoleErrors).toEqual(['[hdlpkg] check requires at least one package name.']);
    });

    it('prints the environment first with --verbose', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.2.1' } });

        runCli(['check', 'oss-cad-suite', '--verbose'], () => context);
        expect(consoleOutput[0]).toBe('Environment settings:');
        expect(consoleOutput).not.toContain('Setting the environment.');
    });
});

// ── env ──────────────────────────────────────────────────────────────────────

describe('env', () => {
    it('prints the pending mutations and applies them', () => {
        const context = makeContext();
        const suiteDir = path.join(packagesDir, 'tools-oss-cad-suite');
        const veribleDir = path.join(packagesDir, 'verible');

        expect(runCli(['env'], () => context)).toBe(0);
        expect(consoleOutput).toEqual([
            'Environment settings:',
            `PATH="${veribleDir}/bin:$PATH"`,
            `PATH="${suiteDir}/bin:$PATH"`,
            `VERILATOR_ROOT="${suiteDir}/share/verilator"`,
        ]);
        expect(context.ambient.PATH).toBe(`${suiteDir}/bin:${veribleDir}/bin:/usr/bin`);
    });

    it('joins PATH with the host delimiter when another platform is configured', () => {
        const context: RuntimeContext = {
            ...makeContext(),
            config: { ...makeContext().config, platform: 'windows_amd64' },
            resources: new Resources(catalog, distribution, { platform: 'windows_amd64', packagesDir }),
        };
        const suiteDir = path.join(packagesDir, 'tools-oss-cad-suite');
        const veribleDir = path.join(packagesDir, 'verible');
        const driversDir = path.join(packagesDir, 'drivers');

        expect(runCli(['env'], () => context)).toBe(0);
        expect(consoleOutput).toEqual([
            'Environment settings:',
            `@set PATH=${driversDir}/bin;%PATH%`,
            `@set PATH=${veribleDir}/bin;%PATH%`,
            `@set PATH=${suiteDir}/bin;%PATH%`,
            `@set VERILATOR_ROOT=${suiteDir}/share/verilator`,
        ]);
        expect(context.ambient.PATH).toBe(
            [`${suiteDir}/bin`, `${veribleDir}/bin`, `${driversDir}/bin`, '/usr/bin'].join(path.delimiter),
        );
    });
});

// ── packages --list ──────────────────────────────────────────────────────────

describe('packages --list', () => {
    it('lists every platform package and exits 1 when one is unusable', () => {
        const context = makeContext({ 'oss-cad-suite': { version: '0.2.1' } });

        expect(runCli(['packages', '--list'], () => context)).toBe(1);
        expect(consoleOutput).toEqual([
            'Packages for linux_x86_64:',
            '  ✓ oss-cad-suite: installed (0.2.1)',
            '  ✗ verible: not installed',
        ]);
    });

    it('rejects other packages subcommands', () => {
        expect(runCli(['packages', '--install'], () => makeContext())).toBe(1);
        expect(consoleErrors).toEqual(['[hdlpkg] Only `packages --list` is supported.']);
    });
});

// ── runCli ───────────────────────────────────────────────────────────────────

describe('runCli', () => {
    it('maps configuration errors from context creation to exit code 2', () => {
        const failing = (): RuntimeContext => {
            throw new ConfigurationError('invalid-catalog', 'Failed to read packages.json');
        };

        expect(runCli(['env'], failing)).toBe(2);
        expect(consoleErrors).toEqual(['[hdlpkg] Internal error (invalid-catalog): Failed to read packages.json']);
    });

    it('rethrows unexpected errors', () => {
        const failing = (): RuntimeContext => {
            throw new TypeError('boom');
        };

        expect(() => runCli(['env'], failing)).toThrow('boom');
    });

    it('answers --help without building a context', () => {
        const createContext = vi.fn(makeContext);

        expect(runCli(['--help'], createContext)).toBe(0);
        expect(createContext).not.toHaveBeenCalled();
    });
});
