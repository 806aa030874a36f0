/**
 * mxtg generate-registration: Migrate the config and write a fresh
 * appservice registration with new tokens.
 */

import { DEFAULT_REGISTRATION_PATH, openConfig, type ConfigOptions } from './options.js';

export async function generateRegistrationCommand(options: ConfigOptions): Promise<void> {
  const config = openConfig({
    ...options,
    registration: options.registration ?? DEFAULT_REGISTRATION_PATH,
  });

  if (!config.update()) {
    console.warn(`  ⚠️  Base config not found: ${config.basePath}. Using the config as it is.`);
  }

  const registration = config.generateRegistration();
  config.save();

  console.log(`  ✅ Registration written to ${config.registrationPath}`);
  console.log(`  ID: ${registration.id}`);
  console.log(`  Users: ${registration.namespaces.users[0].regex}`);
  console.log(`  Aliases: ${registration.namespaces.aliases[0].regex}`);
  console.log('');
  console.log('  Add the registration file to app_service_config_files in your homeserver config.');
}
