import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.patternbench.yaml';

/** Configuration with every field at its schema default. */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Read `.patternbench.yaml` (or `configPath`) relative to the project root.
 * A missing file yields the defaults; an unreadable or invalid one is a CONFIG_LOAD_ERROR.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    const reason = getErrorMessage(error);
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${reason}`,
      { path: fullPath, cause: reason }
    );
  }
}
