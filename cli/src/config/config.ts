/**
 * Bridge Config: the config file, its base template and the registration
 *
 * Typical startup:
 *
 *   const config = new Config('config.yaml', 'registration.yaml', 'example-config.yaml');
 *   config.load();
 *   config.update();               // migrate into the template and save
 *   config.generateRegistration(); // only when asked to
 *   config.save();
 *
 * save() writes the config and then the registration as two separate
 * files. A crash in between leaves the new config next to the old
 * registration.
 */

import fs from 'node:fs';
import { createLogger } from '@mxtg/appservice';
import { stringify as yamlStringify } from 'yaml';
import { generateToken } from '../crypto/tokens.js';
import { migrateConfig } from './migrate.js';
import { getPermissions, type Permissions } from './permissions.js';
import { RecursiveDict } from './recursive-dict.js';
import { buildRegistration, type Registration } from './registration.js';

const log = createLogger('mxtg.config');

export class Config extends RecursiveDict {
  private registration: Registration | null = null;

  constructor(
    readonly path: string,
    readonly registrationPath: string | null,
    readonly basePath: string,
  ) {
    super();
  }

  /** Read the config file. YAML syntax errors are thrown. */
  load(): void {
    this.doc = RecursiveDict.parse(fs.readFileSync(this.path, 'utf-8')).document;
  }

  /** The base template, or null if it cannot be read. */
  loadBase(): RecursiveDict | null {
    let text: string;
    try {
      text = fs.readFileSync(this.basePath, 'utf-8');
    } catch (err) {
      log.warn(`Base config ${this.basePath} is unavailable, skipping migration`, err);
      return null;
    }
    return RecursiveDict.parse(text);
  }

  /**
   * Migrate the loaded config into the base template, switch to the result
   * and save it. Returns false without touching anything if there is no
   * base template.
   */
  update(): boolean {
    const base = this.loadBase();
    if (!base) return false;

    migrateConfig(this, base);
    this.doc = base.document;
    this.save();
    return true;
  }

  save(): void {
    fs.writeFileSync(this.path, this.toString(), 'utf-8');
    if (this.registration && this.registrationPath) {
      fs.writeFileSync(this.registrationPath, yamlStringify(this.registration), 'utf-8');
    }
  }

  /**
   * Issue new appservice tokens, store them in the config and build the
   * registration that save() will write.
   */
  generateRegistration(): Registration {
    this.set('appservice.as_token', generateToken());
    this.set('appservice.hs_token', generateToken());
    this.registration = buildRegistration(this);
    return this.registration;
  }

  get generatedRegistration(): Registration | null {
    return this.registration;
  }

  getPermissions(mxid: string): Permissions {
    return getPermissions(this.get('bridge.permissions'), mxid);
  }
}
