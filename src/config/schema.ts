/**
 * Supervisor Configuration Schema
 */

import { z } from 'zod';
import type { PolicyCatalog } from '../catalog/catalog';
import type { ScheduleTemplate } from '../schedule/schema';
import type { LogLevel } from '../logger';

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);

/** Inline object, or a path relative to the config file */
const InlineOrPathZ = z.union([z.string().min(1), z.record(z.unknown())]);

export const SupervisorConfigFileZ = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, 'must be a semantic version'),
    log_level: LogLevelZ.default('info'),
    store_dir: z.string().min(1),
    require_prior_end_pointer: z.boolean().default(false),
    catalog: InlineOrPathZ,
    schedule: InlineOrPathZ,
  })
  .strict();

export type SupervisorConfigFile = z.input<typeof SupervisorConfigFileZ>;

/**
 * Fully resolved configuration, with catalog and schedule validated.
 */
export interface SupervisorConfig {
  version: string;
  logLevel: LogLevel;
  /** Absolute path of the artifact store */
  storeDir: string;
  requirePriorEndPointer: boolean;
  catalog: PolicyCatalog;
  schedule: ScheduleTemplate;
}
