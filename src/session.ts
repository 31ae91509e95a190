import { Bridge, type Controller } from './bridge';
import { type HubConfig, loadConfig, removeConfig } from './config';
import { describeError, logDebug } from './logger';
import { HueService } from './service-hue';

export interface Hub extends Controller {
  ping(): Promise<string>;
}

export interface SessionOptions {
  env?: NodeJS.ProcessEnv;
  createHub?: (config: HubConfig) => Hub;
}

export class BridgeSessionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BridgeSessionError';
  }
}

const createHueService = (config: HubConfig): Hub => new HueService(config);

/**
 * Connects to the configured hub.
 *
 * A config file that no longer gets us connected is removed so the next run
 * starts from a clean configuration.
 */
export async function openBridge(configPath: string, options: SessionOptions = {}): Promise<Bridge> {
  const loaded = await loadConfig(configPath, options.env);
  if (!loaded) {
    throw new BridgeSessionError(
      'No hub configured. Run "huecast config <host> <app-key>" or set HUE_BRIDGE_IP and HUE_APP_KEY.',
    );
  }

  const { config, source } = loaded;
  const hub = (options.createHub ?? createHueService)(config);

  try {
    const hubId = await hub.ping();
    logDebug(`Connected to hub ${hubId} at ${config.host}`);
  } catch (error) {
    let message = `Failed to connect to hub at ${config.host}: ${describeError(error)}`;

    if (source && (await removeConfig(source))) {
      message += `. Removed stale config ${source}, please configure again.`;
    }

    throw new BridgeSessionError(message, { cause: error });
  }

  return new Bridge(hub);
}
