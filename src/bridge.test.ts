import { describe, expect, it } from 'vitest';
import { Bridge, Store } from './bridge';
import type { Controller, Light } from './bridge';
import type { Xy } from './colors';

class FakeController implements Controller {
  lights: Array<Light> = [{ id: 'l1', name: 'Desk lamp', on: false }];
  listCalls = 0;
  readonly colors: Array<[string, Xy, boolean]> = [];
  readonly power: Array<[string, boolean]> = [];

  async listLights(): Promise<Array<Light>> {
    this.listCalls++;
    return this.lights;
  }

  async setLightColor(lightId: string, xy: Xy, on: boolean): Promise<void> {
    this.colors.push([lightId, xy, on]);
  }

  async setLightPower(lightId: string, on: boolean): Promise<void> {
    this.power.push([lightId, on]);
  }
}

describe('Store', () => {
  it('keeps values by key', () => {
    const store = new Store<number>();
    store.set('a', 1);

    expect(store.get('a')).toBe(1);
    expect(store.size).toBe(1);

    store.clear();
    expect(store.get('a')).toBeUndefined();
    expect(store.size).toBe(0);
  });
});

describe('Bridge', () => {
  it('remembers the listed lights', async () => {
    const controller = new FakeController();
    const bridge = new Bridge(controller);

    expect(await bridge.listLights()).toEqual([{ id: 'l1', name: 'Desk lamp', on: false }]);
    expect(await bridge.getLight('l1')).toEqual({ id: 'l1', name: 'Desk lamp', on: false });
  });

  it('forgets lights the hub no longer reports', async () => {
    const controller = new FakeController();
    const bridge = new Bridge(controller);
    await bridge.listLights();

    controller.lights = [{ id: 'l2', name: 'TV strip' }];
    await bridge.listLights();

    await expect(bridge.getLight('l1')).rejects.toThrow('Light l1 not found');
    expect(await bridge.getLight('l2')).toEqual({ id: 'l2', name: 'TV strip' });
  });

  it('loads lights once before the first command', async () => {
    const controller = new FakeController();
    const bridge = new Bridge(controller);

    await bridge.setLightColor('l1', { x: 0.3, y: 0.3 }, true);
    await bridge.setLightColor('l1', { x: 0.4, y: 0.4 }, true);

    expect(controller.listCalls).toBe(1);
    expect(controller.colors).toEqual([
      ['l1', { x: 0.3, y: 0.3 }, true],
      ['l1', { x: 0.4, y: 0.4 }, true],
    ]);
    expect((await bridge.getLight('l1')).on).toBe(true);
  });

  it('switches lights off', async () => {
    const controller = new FakeController();
    const bridge = new Bridge(controller);

    await bridge.setLightPower('l1', false);

    expect(controller.power).toEqual([['l1', false]]);
    expect((await bridge.getLight('l1')).on).toBe(false);
  });

  it('refuses unknown lights', async () => {
    const controller = new FakeController();
    const bridge = new Bridge(controller);

    await expect(bridge.setLightColor('l9', { x: 0.3, y: 0.3 }, true)).rejects.toThrow('Light l9 not found');
    await expect(bridge.getLight('l9')).rejects.toThrow('Light l9 not found');
    expect(controller.colors).toEqual([]);
  });
});
