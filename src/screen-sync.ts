import type { Controller } from './bridge';
import { type Rgb, rgbToXy, type Xy } from './colors';
import type { Region } from './frame';
import { logDebug } from './logger';
import { sleep } from './utils';

export const DEFAULT_INTERVAL_MS = 100;

/**
 * What the loop needs from a sampler.
 */
export interface RegionColorSource {
  readonly failure: Error | null;
  getRegionColor(left: number, top: number, right: number, bottom: number): Rgb;
}

/**
 * Reads the region's average color. Throws the capture failure instead of
 * answering black once the backend has died.
 */
export function sampleRegion(source: RegionColorSource, { left, top, right, bottom }: Region): Rgb {
  if (source.failure) {
    throw source.failure;
  }

  return source.getRegionColor(left, top, right, bottom);
}

export interface ScreenSyncOptions {
  lightId: string;
  region: Region;
  intervalMs?: number;
  signal?: AbortSignal;
  onColor?: (rgb: Rgb, xy: Xy) => void;
}

/**
 * Pushes the region's average color to a light about every `intervalMs`
 * until `signal` aborts. Hub errors and capture failures end the loop.
 *
 * Returns the number of updates sent.
 */
export async function runScreenSync(
  source: RegionColorSource,
  controller: Controller,
  { lightId, region, intervalMs = DEFAULT_INTERVAL_MS, signal, onColor }: ScreenSyncOptions,
): Promise<number> {
  let updates = 0;

  while (!signal?.aborted) {
    const rgb = sampleRegion(source, region);
    const xy = rgbToXy(...rgb);

    await controller.setLightColor(lightId, xy, true);
    updates++;
    onColor?.(rgb, xy);

    if (!(await sleep(intervalMs, signal))) {
      break;
    }
  }

  logDebug(`Screen sync for light ${lightId} stopped after ${updates} updates`);
  return updates;
}
