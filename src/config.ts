import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

export const CONFIG_FILE = '.huecast.json';

export const configSchema = z.object({
  host: z.string().trim().min(1),
  appKey: z.string().trim().min(1),
});

export type HubConfig = z.infer<typeof configSchema>;

export interface LoadedConfig {
  config: HubConfig;
  /** File the config was read from; null when it came from the environment. */
  source: string | null;
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function resolveConfigPath (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  return path.resolve(cwd, env.HUECAST_CONFIG || CONFIG_FILE);
}

function isMissingFile (error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * HUE_BRIDGE_IP and HUE_APP_KEY win over the file when both are set.
 * Returns null when neither source has a configuration.
 */
export async function loadConfig (filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig | null> {
  if (env.HUE_BRIDGE_IP && env.HUE_APP_KEY) {
    const parsed = configSchema.safeParse({ host: env.HUE_BRIDGE_IP, appKey: env.HUE_APP_KEY });
    if (!parsed.success) {
      throw new ConfigError('HUE_BRIDGE_IP and HUE_APP_KEY must not be blank', { cause: parsed.error });
    }

    return { config: parsed.data, source: null };
  }

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError(`Could not read ${filePath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)').join(', ');
    throw new ConfigError(`${filePath} is missing or has invalid fields: ${fields}`, { cause: parsed.error });
  }

  return { config: parsed.data, source: filePath };
}

export async function saveConfig (filePath: string, config: HubConfig): Promise<HubConfig> {
  const valid = configSchema.parse(config);
  await fs.writeFile(filePath, `${JSON.stringify(valid, null, 2)}\n`, 'utf8');
  return valid;
}

/**
 * Deletes the file; a missing file is not an error.
 */
export async function removeConfig (filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
}
