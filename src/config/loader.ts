/**
 * Supervisor Configuration Loader
 *
 * Reads `supervisor.yaml`, resolves the catalog and schedule it points at,
 * and validates all three. Any problem aborts startup with a
 * ConfigurationError; nothing is coerced.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { toSchemaIssues } from '../contracts/schemas';
import { ConfigurationError } from '../errors';
import { loadCatalog, parseCatalog } from '../catalog/loader';
import { loadSchedule, parseSchedule } from '../schedule/loader';
import { SupervisorConfigFileZ, type SupervisorConfig } from './schema';

/**
 * Expand ~ to the home directory
 */
export function expandPath(filepath: string): string {
  if (filepath.startsWith('~')) {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

function resolveFrom(baseDir: string, filepath: string): string {
  return path.resolve(baseDir, expandPath(filepath));
}

/**
 * Validate parsed config data. Relative paths resolve against `baseDir`.
 *
 * @throws ConfigurationError
 */
export function resolveSupervisorConfig(input: unknown, baseDir: string): SupervisorConfig {
  const result = SupervisorConfigFileZ.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid supervisor config', toSchemaIssues(result.error));
  }
  const raw = result.data;

  const catalog = typeof raw.catalog === 'string'
    ? loadCatalog(resolveFrom(baseDir, raw.catalog))
    : parseCatalog(raw.catalog);
  const schedule = typeof raw.schedule === 'string'
    ? loadSchedule(resolveFrom(baseDir, raw.schedule))
    : parseSchedule(raw.schedule);

  return Object.freeze({
    version: raw.version,
    logLevel: raw.log_level,
    storeDir: resolveFrom(baseDir, raw.store_dir),
    requirePriorEndPointer: raw.require_prior_end_pointer,
    catalog,
    schedule: Object.freeze(schedule),
  });
}

/**
 * Load the supervisor config from a YAML file.
 *
 * @throws ConfigurationError
 */
export function loadSupervisorConfig(filepath: string): SupervisorConfig {
  const expanded = path.resolve(expandPath(filepath));
  if (!fs.existsSync(expanded)) {
    throw new ConfigurationError(`Supervisor config not found: ${expanded}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(expanded, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Supervisor config is not valid YAML: ${expanded}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return resolveSupervisorConfig(raw, path.dirname(expanded));
}
