/**
 * mxtg migrate: Move a config onto the current base template
 */

import { openConfig, type ConfigOptions } from './options.js';

export async function migrateCommand(options: ConfigOptions): Promise<void> {
  const config = openConfig(options);

  if (!config.update()) {
    console.warn(`  ⚠️  Base config not found: ${config.basePath}. Config left unchanged.`);
    return;
  }

  console.log(`  ✅ Config migrated: ${config.path}`);
}
