/**
 * Policy/Catalog Module
 *
 * Deterministic tables mapping observations to fatigue bands, modes and
 * required actions.
 */

export { PolicyCatalog } from './catalog';
export { validateCatalog, parseCatalog, loadCatalog, type CatalogValidationResult } from './loader';
export {
  PolicyCatalogZ,
  MAX_OTEST_SECONDS,
  type OTestProcedure,
  type ClassifierThresholds,
  type PolicyRule,
  type ResetPolicy,
  type PolicyCatalogData,
} from './schema';
