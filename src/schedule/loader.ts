/**
 * Schedule Loader
 *
 * Load and validate the weekly schedule template.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../errors';
import { toSchemaIssues } from '../contracts/schemas';
import { ScheduleTemplateZ, type ScheduleTemplate } from './schema';

/**
 * Validate template data; overlapping or malformed ranges are fatal.
 *
 * @throws ConfigurationError listing every violation
 */
export function parseSchedule(input: unknown): ScheduleTemplate {
  const result = ScheduleTemplateZ.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid schedule template', toSchemaIssues(result.error));
  }
  return result.data;
}

/**
 * Load a schedule template from a YAML file.
 */
export function loadSchedule(filepath: string): ScheduleTemplate {
  if (!fs.existsSync(filepath)) {
    throw new ConfigurationError(`Schedule template not found: ${filepath}`);
  }
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(filepath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Schedule template is not valid YAML: ${filepath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSchedule(raw);
}
