/**
 * Shared command options and config loading.
 */

import path from 'node:path';
import { Config } from '../config/config.js';
import { errorMessage } from '../config/values.js';

export const DEFAULT_CONFIG_PATH = process.env.MXTG_CONFIG || 'config.yaml';
export const DEFAULT_BASE_CONFIG_PATH = 'example-config.yaml';
export const DEFAULT_REGISTRATION_PATH = 'registration.yaml';

export interface ConfigOptions {
  config: string;
  baseConfig?: string;
  registration?: string;
}

/**
 * Load the config named by the options, or exit with an error.
 */
export function openConfig(options: ConfigOptions): Config {
  const config = new Config(
    path.resolve(options.config),
    options.registration ? path.resolve(options.registration) : null,
    path.resolve(options.baseConfig ?? DEFAULT_BASE_CONFIG_PATH),
  );

  try {
    config.load();
  } catch (err) {
    console.error(`  ❌ Failed to read config ${config.path}: ${errorMessage(err)}`);
    process.exit(1);
  }
  return config;
}
