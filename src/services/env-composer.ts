import path from 'node:path';
import { ConfigurationError } from '../core/errors.js';
import type { EnvMutations, PackageDefinition, PackageRegistry } from '../types/packages.js';
import type { Logger } from '../utils/logger.js';

/**
 * Records whether this process has already applied package env mutations.
 * Owned by the top-level context and passed to {@link setEnvForPackages}.
 */
export class EnvironmentGuard {
  #applied = false;

  isApplied(): boolean {
    return this.#applied;
  }

  markApplied(): void {
    this.#applied = true;
  }
}

/**
 * Collect the env mutations of every package, in registry order.
 * Every definition must carry an `env` section, even an empty one.
 */
export function composeEnvMutations(
  packages: ReadonlyMap<string, PackageDefinition>,
): EnvMutations {
  const paths: string[] = [];
  const vars: (readonly [string, string])[] = [];

  for (const [name, definition] of packages) {
    if (!definition.env) {
      throw new ConfigurationError(
        'missing-env-section',
        `Package '${name}' has no 'env' section in the catalog.`,
      );
    }

    paths.push(...definition.env.path);
    for (const [varName, varValue] of Object.entries(definition.env.vars)) {
      vars.push([varName, varValue] as const);
    }
  }

  return Object.freeze({
    paths: Object.freeze(paths),
    vars: Object.freeze(vars),
  });
}

/**
 * Apply mutations to `ambient`. Paths are prepended one at a time in reverse
 * so the first collected path ends up first in PATH. Vars are assigned in
 * order, so a later package overrides an earlier one.
 */
export function applyEnvMutations(
  mutations: EnvMutations,
  ambient: NodeJS.ProcessEnv = process.env,
  delimiter: string = path.delimiter,
): void {
  if (mutations.paths.length > 0) {
    let current = ambient.PATH ?? '';
    for (const entry of [...mutations.paths].reverse()) {
      current = current.length > 0 ? `${entry}${delimiter}${current}` : entry;
    }
    ambient.PATH = current;
  }

  for (const [name, value] of mutations.vars) {
    ambient[name] = value;
  }
}

/** Shell-style rendering of pending mutations, in application order. */
export function formatEnvMutations(mutations: EnvMutations, windows: boolean): string[] {
  const lines: string[] = [];

  for (const entry of [...mutations.paths].reverse()) {
    lines.push(windows ? `@set PATH=${entry};%PATH%` : `PATH="${entry}:$PATH"`);
  }

  for (const [name, value] of mutations.vars) {
    lines.push(windows ? `@set ${name}=${value}` : `${name}="${value}"`);
  }

  return lines;
}

export interface SetEnvOptions {
  guard: EnvironmentGuard;
  ambient?: NodeJS.ProcessEnv;
  /** Selects the dump syntax only; PATH is always joined with the host delimiter. */
  windows?: boolean;
  /** Print the pending mutations before applying them. */
  verbose?: boolean;
  print?: (line: string) => void;
  logger?: Logger;
}

/**
 * Set the env for every package available on this platform, installed or not.
 * Only the first call per guard touches `ambient`; later calls are no-ops.
 * Returns true when this call applied the mutations.
 */
export function setEnvForPackages(
  registry: Pick<PackageRegistry, 'platformPackages'>,
  options: SetEnvOptions,
): boolean {
  const print = options.print ?? ((line: string) => console.log(line));
  const windows = options.windows ?? process.platform === 'win32';
  const mutations = composeEnvMutations(registry.platformPackages);

  if (options.verbose) {
    print('Environment settings:');
    for (const line of formatEnvMutations(mutations, windows)) {
      print(line);
    }
  }

  if (options.guard.isApplied()) {
    options.logger?.debug('Package environment already set; skipping.');
    return false;
  }

  applyEnvMutations(mutations, options.ambient ?? process.env);
  options.guard.markApplied();
  options.logger?.debug(
    `Applied ${mutations.paths.length} PATH entries and ${mutations.vars.length} variables.`,
  );

  if (!options.verbose) {
    print('Setting the environment.');
  }
  return true;
}
