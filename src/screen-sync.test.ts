import { describe, expect, it, vi } from 'vitest';
import type { Controller, Light } from './bridge';
import { type Rgb, rgbToXy, type Xy } from './colors';
import { FULL_FRAME } from './frame';
import { type RegionColorSource, runScreenSync, sampleRegion } from './screen-sync';

class FakeController implements Controller {
  readonly updates: Array<{ lightId: string; xy: Xy; on: boolean }> = [];
  error: Error | null = null;
  onUpdate: () => void = () => undefined;

  async listLights(): Promise<Array<Light>> {
    return [];
  }

  async setLightColor(lightId: string, xy: Xy, on: boolean): Promise<void> {
    if (this.error) {
      throw this.error;
    }
    this.updates.push({ lightId, xy, on });
    this.onUpdate();
  }

  async setLightPower(): Promise<void> {
    throw new Error('not used');
  }
}

class FakeSource implements RegionColorSource {
  failure: Error | null = null;
  readonly queries: Array<[number, number, number, number]> = [];

  constructor(private readonly colors: Array<Rgb>) {}

  getRegionColor(left: number, top: number, right: number, bottom: number): Rgb {
    this.queries.push([left, top, right, bottom]);
    return this.colors[Math.min(this.queries.length, this.colors.length) - 1];
  }
}

describe('runScreenSync', () => {
  it('sends the converted region color to the light until aborted', async () => {
    const source = new FakeSource([[255, 0, 0], [0, 0, 255], [255, 255, 255]]);
    const controller = new FakeController();
    const abort = new AbortController();
    controller.onUpdate = () => {
      if (controller.updates.length === 3) {
        abort.abort();
      }
    };

    const updates = await runScreenSync(source, controller, {
      lightId: 'light-1',
      region: { left: 0.1, top: 0.2, right: 0.3, bottom: 0.4 },
      intervalMs: 1,
      signal: abort.signal,
    });

    expect(updates).toBe(3);
    expect(source.queries).toEqual([
      [0.1, 0.2, 0.3, 0.4],
      [0.1, 0.2, 0.3, 0.4],
      [0.1, 0.2, 0.3, 0.4],
    ]);
    expect(controller.updates).toEqual([
      { lightId: 'light-1', xy: rgbToXy(255, 0, 0), on: true },
      { lightId: 'light-1', xy: rgbToXy(0, 0, 255), on: true },
      { lightId: 'light-1', xy: rgbToXy(255, 255, 255), on: true },
    ]);
  });

  it('reports each color it sends', async () => {
    const source = new FakeSource([[0, 0, 0]]);
    const controller = new FakeController();
    const abort = new AbortController();
    const onColor = vi.fn(() => abort.abort());

    await runScreenSync(source, controller, { lightId: '1', region: FULL_FRAME, signal: abort.signal, onColor });

    expect(onColor).toHaveBeenCalledTimes(1);
    expect(onColor).toHaveBeenCalledWith([0, 0, 0], { x: 0, y: 0 });
  });

  it('does nothing when already aborted', async () => {
    const source = new FakeSource([[1, 1, 1]]);
    const controller = new FakeController();

    const updates = await runScreenSync(source, controller, {
      lightId: '1',
      region: FULL_FRAME,
      signal: AbortSignal.abort(),
    });

    expect(updates).toBe(0);
    expect(source.queries).toEqual([]);
  });

  it('waits the interval between updates', async () => {
    const source = new FakeSource([[1, 1, 1]]);
    const controller = new FakeController();
    const abort = new AbortController();
    controller.onUpdate = () => {
      if (controller.updates.length === 2) {
        abort.abort();
      }
    };

    const started = Date.now();
    await runScreenSync(source, controller, { lightId: '1', region: FULL_FRAME, intervalMs: 40, signal: abort.signal });

    expect(Date.now() - started).toBeGreaterThanOrEqual(35);
  });

  it('stops with the hub error', async () => {
    const controller = new FakeController();
    controller.error = new Error('Hub rejected PUT /light/1');

    await expect(
      runScreenSync(new FakeSource([[1, 2, 3]]), controller, { lightId: '1', region: FULL_FRAME, intervalMs: 1 }),
    ).rejects.toThrow('Hub rejected PUT /light/1');
  });

  it('stops when the capture has failed', async () => {
    const source = new FakeSource([[1, 2, 3]]);
    const controller = new FakeController();
    controller.onUpdate = () => {
      source.failure = new Error('gst-launch-1.0 exited with code 1');
    };

    await expect(
      runScreenSync(source, controller, { lightId: '1', region: FULL_FRAME, intervalMs: 1 }),
    ).rejects.toThrow('gst-launch-1.0 exited with code 1');
    expect(controller.updates).toHaveLength(1);
  });
});

describe('sampleRegion', () => {
  it('reads the region bounds in order', () => {
    const source = new FakeSource([[9, 8, 7]]);

    expect(sampleRegion(source, { left: 0.1, top: 0.2, right: 0.3, bottom: 0.4 })).toEqual([9, 8, 7]);
    expect(source.queries).toEqual([[0.1, 0.2, 0.3, 0.4]]);
  });

  it('throws the capture failure instead of reading', () => {
    const source = new FakeSource([[0, 0, 0]]);
    source.failure = new Error('capture stopped');

    expect(() => sampleRegion(source, FULL_FRAME)).toThrow('capture stopped');
    expect(source.queries).toEqual([]);
  });
});
