import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Controller, Light } from './bridge';
import type { Xy } from './colors';
import type { HubConfig } from './config';
import { logDebug } from './logger';

const REQUEST_TIMEOUT_MS = 5_000;

const errorsSchema = z.array(z.object({ description: z.string() })).optional();

const lightResource = z.object({
  id: z.string(),
  owner: z.object({ rid: z.string(), rtype: z.string() }).optional(),
  on: z.object({ on: z.boolean() }).optional(),
});

const deviceResource = z.object({
  id: z.string(),
  metadata: z.object({ name: z.string() }),
});

const bridgeResource = z.object({
  id: z.string(),
  bridge_id: z.string().optional(),
});

const updateResult = z.object({
  rid: z.string(),
  rtype: z.string(),
});

const envelope = <T extends z.ZodTypeAny>(item: T) => z.object({ errors: errorsSchema, data: z.array(item) });

const lightsResponse = envelope(lightResource);
const devicesResponse = envelope(deviceResource);
const bridgeResponse = envelope(bridgeResource);
const updateResponse = envelope(updateResult);

/**
 * Hub answered with an HTTP failure or reported errors in its response.
 */
export class HubError extends Error {
  readonly status?: number;
  readonly errors: Array<string>;

  constructor(message: string, options: ErrorOptions & { status?: number; errors?: Array<string> } = {}) {
    super(message, { cause: options.cause });
    this.name = 'HubError';
    this.status = options.status;
    this.errors = options.errors ?? [];
  }
}

const describeHubErrors = (body: unknown): Array<string> => {
  const parsed = z.object({ errors: errorsSchema }).safeParse(body);
  return parsed.success ? (parsed.data.errors ?? []).map((error) => error.description) : [];
};

export interface HueServiceOptions extends HubConfig {
  timeoutMs?: number;
  /** Replaces the HTTP transport, used by tests. */
  adapter?: AxiosAdapter;
}

/**
 * Hub client over the CLIP v2 HTTPS API.
 * The hub serves a self-signed certificate, so it is not verified.
 */
export class HueService implements Controller {
  private debug = logDebug;
  private http: AxiosInstance;

  constructor(private readonly options: HueServiceOptions) {
    this.http = axios.create({
      baseURL: `https://${options.host}/clip/v2/resource`,
      headers: { 'hue-application-key': options.appKey },
      httpsAgent: new https.Agent({ rejectUnauthorized: false }),
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      adapter: options.adapter,
    });
  }

  get host(): string {
    return this.options.host;
  }

  /**
   * Checks credentials and reachability; resolves the hub id.
   */
  async ping(): Promise<string> {
    const [bridge] = await this.fetch(bridgeResponse, '/bridge');
    if (!bridge) {
      throw new HubError(`Hub at ${this.host} did not describe itself`);
    }

    return bridge.bridge_id ?? bridge.id;
  }

  /**
   * Lights named after the device that owns them. Lights with no owning
   * device are left out.
   */
  async listLights(): Promise<Array<Light>> {
    const [lights, devices] = await Promise.all([
      this.fetch(lightsResponse, '/light'),
      this.fetch(devicesResponse, '/device'),
    ]);

    const names = new Map(devices.map((device) => [device.id, device.metadata.name]));
    const result: Array<Light> = [];

    for (const light of lights) {
      const name = light.owner ? names.get(light.owner.rid) : undefined;
      if (name === undefined) {
        this.debug(`Skipping light ${light.id} without an owning device`);
        continue;
      }

      result.push({ id: light.id, name, on: light.on?.on });
    }

    return result;
  }

  async setLightColor(lightId: string, xy: Xy, on: boolean): Promise<void> {
    await this.updateLight(lightId, { on: { on }, color: { xy: { x: xy.x, y: xy.y } } });
  }

  async setLightPower(lightId: string, on: boolean): Promise<void> {
    await this.updateLight(lightId, { on: { on } });
  }

  private async updateLight(lightId: string, body: object): Promise<void> {
    const url = `/light/${encodeURIComponent(lightId)}`;
    await this.fetch(updateResponse, url, 'put', body);
    this.debug(`PUT ${url} ${JSON.stringify(body)}`);
  }

  private async fetch<T>(
    schema: z.ZodType<{ errors?: Array<{ description: string }>; data: Array<T> }, z.ZodTypeDef, unknown>,
    url: string,
    method: 'get' | 'put' = 'get',
    body?: object,
  ): Promise<Array<T>> {
    const parsed = schema.safeParse(await this.request(method, url, body));
    if (!parsed.success) {
      throw new HubError(`Unexpected response from hub for ${method.toUpperCase()} ${url}`, { cause: parsed.error });
    }

    const errors = (parsed.data.errors ?? []).map((error) => error.description);
    if (errors.length > 0) {
      throw new HubError(`Hub rejected ${method.toUpperCase()} ${url}: ${errors.join('; ')}`, { errors });
    }

    return parsed.data.data;
  }

  private async request(method: 'get' | 'put', url: string, body?: object): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({ method, url, data: body });
      return response.data;
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }

      const status = error.response?.status;
      const errors = describeHubErrors(error.response?.data);
      const reason = errors.length > 0 ? errors.join('; ') : error.message;

      throw new HubError(`Hub request ${method.toUpperCase()} ${url} failed: ${reason}`, { status, errors, cause: error });
    }
  }
}
