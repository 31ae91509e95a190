import type { Xy } from './colors';

export interface Light {
  id: string;
  name: string;
  on?: boolean;
}

/**
 * What the rest of the tool needs from a lighting hub.
 */
export interface Controller {
  listLights(): Promise<Array<Light>>;
  setLightColor(lightId: string, xy: Xy, on: boolean): Promise<void>;
  setLightPower(lightId: string, on: boolean): Promise<void>;
}

export class Store<T> {
  data: Map<string, T>;

  constructor() {
    this.data = new Map<string, T>();
  }

  get size(): number {
    return this.data.size;
  }

  get(key: string): T | undefined {
    return this.data.get(key);
  }

  set(key: string, value: T): void {
    this.data.set(key, value);
  }

  clear(): void {
    this.data.clear();
  }
}

/**
 * Connected hub session. Remembers the lights the hub reported and refuses
 * commands for lights it does not know.
 */
export class Bridge implements Controller {
  private store: Store<Light>;

  constructor(private controller: Controller) {
    this.store = new Store<Light>();
  }

  async listLights(): Promise<Array<Light>> {
    const lights = await this.controller.listLights();

    this.store.clear();
    lights.forEach((light) => this.store.set(light.id, light));

    return lights;
  }

  async getLight(lightId: string): Promise<Light> {
    if (this.store.size === 0) {
      await this.listLights();
    }

    const light = this.store.get(lightId);
    if (!light) {
      throw new Error(`Light ${lightId} not found`);
    }

    return light;
  }

  async setLightColor(lightId: string, xy: Xy, on: boolean): Promise<void> {
    const light = await this.getLight(lightId);

    await this.controller.setLightColor(light.id, xy, on);
    this.store.set(light.id, { ...light, on });
  }

  async setLightPower(lightId: string, on: boolean): Promise<void> {
    const light = await this.getLight(lightId);

    await this.controller.setLightPower(light.id, on);
    this.store.set(light.id, { ...light, on });
  }
}
