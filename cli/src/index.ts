#!/usr/bin/env node

/**
 * mxtg: Matrix-Telegram bridge tooling
 *
 * Migrates bridge configs onto the current template, writes the appservice
 * registration and sets up the bridge bot.
 *
 * Usage:
 *   mxtg migrate [-c config.yaml] [-b example-config.yaml]
 *   mxtg generate-registration [-c config.yaml] [-b example-config.yaml] [-r registration.yaml]
 *   mxtg permissions <mxid> [-c config.yaml]
 *   mxtg validate [-c config.yaml]
 *   mxtg bot-profile [-c config.yaml]
 *
 * MXTG_CONFIG sets the default config path.
 */

import { Command } from 'commander';
import { botProfileCommand } from './commands/bot-profile.js';
import { generateRegistrationCommand } from './commands/generate-registration.js';
import { migrateCommand } from './commands/migrate.js';
import {
  DEFAULT_BASE_CONFIG_PATH,
  DEFAULT_CONFIG_PATH,
  DEFAULT_REGISTRATION_PATH,
} from './commands/options.js';
import { permissionsCommand } from './commands/permissions.js';
import { validateCommand } from './commands/validate.js';

const program = new Command();

program
  .name('mxtg')
  .description('Matrix-Telegram bridge configuration and registration tooling')
  .version('0.1.0');

// mxtg migrate
program
  .command('migrate')
  .description('Copy the settings of a config onto the base template and save it')
  .option('-c, --config <path>', 'Config file to migrate', DEFAULT_CONFIG_PATH)
  .option('-b, --base-config <path>', 'Base template with the current config layout', DEFAULT_BASE_CONFIG_PATH)
  .action(migrateCommand);

// mxtg generate-registration
program
  .command('generate-registration')
  .description('Migrate the config and write an appservice registration with new tokens')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .option('-b, --base-config <path>', 'Base template with the current config layout', DEFAULT_BASE_CONFIG_PATH)
  .option('-r, --registration <path>', 'Where to write the registration', DEFAULT_REGISTRATION_PATH)
  .action(generateRegistrationCommand);

// mxtg permissions <mxid>
program
  .command('permissions <mxid>')
  .description('Show the bridge permissions of a Matrix user')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(permissionsCommand);

// mxtg validate
program
  .command('validate')
  .description('Check a config for missing or invalid settings')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(validateCommand);

// mxtg bot-profile
program
  .command('bot-profile')
  .description('Register the bridge bot and apply its display name and avatar')
  .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_PATH)
  .action(botProfileCommand);

await program.parseAsync();
