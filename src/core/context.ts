import { resolveAppConfig } from '../config/app-config.js';
import type { AppConfig } from '../config/app-config.js';
import { Profile } from '../config/profile.js';
import { Resources } from '../config/resources.js';
import { EnvironmentGuard } from '../services/env-composer.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

/** Process-wide state shared by every command of one CLI run. */
export interface RuntimeContext {
  config: AppConfig;
  resources: Resources;
  profile: Profile;
  guard: EnvironmentGuard;
  logger: Logger;
  /** Environment that package mutations are applied to. */
  ambient: NodeJS.ProcessEnv;
}

export function createRuntimeContext(config: AppConfig = resolveAppConfig()): RuntimeContext {
  const logger = createLogger(config.logLevel);
  const resources = Resources.load({
    resourcesDir: config.resourcesDir,
    packagesDir: config.packagesDir,
    platform: config.platform,
  });
  logger.debug(
    `Loaded ${resources.allPackages.size} packages (${resources.platformPackages.size} for ${config.platform}).`,
  );

  return {
    config,
    resources,
    profile: Profile.load(config.homeDir),
    guard: new EnvironmentGuard(),
    logger,
    ambient: process.env,
  };
}
