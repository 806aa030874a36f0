/**
 * Apply the logging section of the bridge config to the logger registry.
 *
 *   logging:
 *       root:
 *           level: INFO
 *       loggers:
 *           mxtg:
 *               level: DEBUG
 */

import { createLogger, parseLogLevel, setLogLevel } from '@mxtg/appservice';
import type { RecursiveDict } from './recursive-dict.js';
import { isRecord } from './values.js';

const log = createLogger('mxtg.config');

/**
 * Returns the names of the loggers whose level was set.
 */
export function configureLogging(config: RecursiveDict): string[] {
  const configured: string[] = [];

  const apply = (name: string, raw: unknown): void => {
    if (raw === undefined || raw === null) return;
    const level = parseLogLevel(raw);
    if (!level) {
      log.warn(`Ignoring unknown log level "${String(raw)}" for ${name}`);
      return;
    }
    setLogLevel(name, level);
    configured.push(name);
  };

  apply('root', config.get('logging.root.level'));

  for (const [name, settings] of Object.entries(asRecord(config.get('logging.loggers')))) {
    apply(name, isRecord(settings) ? settings.level : undefined);
  }

  return configured;
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
