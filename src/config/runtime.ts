/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the process. Pipelines resolve
 * their own frozen config from it at construction, so call setRuntimeConfig()
 * before creating pipelines to change their defaults.
 *
 * @module config/runtime
 */

import type { RuntimeConfigOverrides, RuntimeConfigSchema } from './schema/index.js';
import { createRuntimeConfig } from './schema/index.js';
import { log } from '../debug/log.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig(overrides);
  log.debug('Config', 'Runtime config updated');
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  return runtimeConfig;
}
