/**
 * mxtg permissions <mxid>: Show what a Matrix user may do on the bridge
 */

import { formatPermissions } from '../config/permissions.js';
import { openConfig, type ConfigOptions } from './options.js';

export async function permissionsCommand(mxid: string, options: ConfigOptions): Promise<void> {
  const config = openConfig(options);
  const permissions = config.getPermissions(mxid);

  console.log('');
  console.log(`  Permissions for ${mxid}`);
  console.log('  ─────────────────────');
  for (const line of formatPermissions(permissions)) {
    console.log(`  ${line}`);
  }
  console.log('');
}
