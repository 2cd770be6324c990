/**
 * Config module - configuration resolution and management
 */

export type { CliFlags, ResolveConfigOptions, ConfigResolution } from './resolve-config';
export {
  ARTIFACT_DIR_NAME,
  resolveConfig,
  generateRunId,
  getRepoConfigPath,
  getUserConfigPath,
} from './resolve-config';

export {
  EFFECTIVE_CONFIG_FILE_NAME,
  redactConfig,
  writeEffectiveConfigArtifact,
  formatEffectiveConfigForDisplay,
} from './write-effective-config';
