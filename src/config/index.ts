/**
 * Configuration Module
 */

export { loadSupervisorConfig, resolveSupervisorConfig, expandPath } from './loader';
export {
  LogLevelZ,
  SupervisorConfigFileZ,
  type SupervisorConfig,
  type SupervisorConfigFile,
} from './schema';
