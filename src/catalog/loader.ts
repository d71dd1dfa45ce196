/**
 * Catalog Loader
 *
 * Load the policy catalog from YAML and validate it before anything
 * consumes it.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../errors';
import { toSchemaIssues, type SchemaIssue } from '../contracts/schemas';
import { PolicyCatalogZ } from './schema';
import { PolicyCatalog } from './catalog';

export interface CatalogValidationResult {
  valid: boolean;
  errors: SchemaIssue[];
}

/**
 * Validate raw catalog data without constructing a catalog.
 */
export function validateCatalog(input: unknown): CatalogValidationResult {
  const result = PolicyCatalogZ.safeParse(input);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: toSchemaIssues(result.error) };
}

/**
 * Build a catalog from already-parsed data (inline config, tests).
 *
 * @throws ConfigurationError listing every violation
 */
export function parseCatalog(input: unknown): PolicyCatalog {
  const result = PolicyCatalogZ.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid policy catalog', toSchemaIssues(result.error));
  }
  return new PolicyCatalog(result.data);
}

/**
 * Load a catalog from a YAML file.
 */
export function loadCatalog(filepath: string): PolicyCatalog {
  if (!fs.existsSync(filepath)) {
    throw new ConfigurationError(`Policy catalog not found: ${filepath}`);
  }
  const content = fs.readFileSync(filepath, 'utf-8');
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (e) {
    throw new ConfigurationError(`Policy catalog is not valid YAML: ${filepath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseCatalog(raw);
}
