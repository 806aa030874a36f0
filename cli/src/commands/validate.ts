/**
 * mxtg validate: Check a config before starting the bridge
 */

import { validateConfig } from '../config/validate.js';
import { openConfig, type ConfigOptions } from './options.js';

export async function validateCommand(options: ConfigOptions): Promise<void> {
  const config = openConfig(options);
  const errors = validateConfig(config);

  if (errors.length > 0) {
    console.error('  ❌ Config validation errors:');
    for (const error of errors) {
      console.error(`    - ${error}`);
    }
    process.exit(1);
  }

  console.log(`  ✅ Config is valid: ${config.path}`);
}
