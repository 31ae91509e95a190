import { BLACK, type Rgb } from './colors';

const CHANNELS = 3;

export interface FrameSize {
  width: number;
  height: number;
}

/**
 * One decoded capture: packed row-major RGB, `width * height * 3` bytes.
 * Frames are never mutated once built; a newer capture replaces the whole object.
 */
export interface Frame extends FrameSize {
  readonly data: Uint8Array;
}

/**
 * Fractional rectangle over a frame, each bound in [0, 1].
 */
export interface Region {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export const FULL_FRAME: Region = { left: 0, top: 0, right: 1, bottom: 1 };

export function createFrame(width: number, height: number, data: Uint8Array): Frame {
  const expected = width * height * CHANNELS;
  if (data.length !== expected) {
    throw new RangeError(`Frame data is ${data.length} bytes, expected ${expected} for ${width}x${height}`);
  }

  return { width, height, data };
}

export function fillFrame(width: number, height: number, paint: (x: number, y: number) => Rgb): Frame {
  const data = new Uint8Array(width * height * CHANNELS);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = (y * width + x) * CHANNELS;
      const [r, g, b] = paint(x, y);
      data[idx] = r;
      data[idx + 1] = g;
      data[idx + 2] = b;
    }
  }

  return { width, height, data };
}

const toPixel = (fraction: number, dimension: number): number =>
  Math.min(dimension, Math.max(0, Math.floor(fraction * dimension)));

/**
 * Mean color of the pixels inside `region`, truncated per channel.
 * Empty or inverted regions yield black.
 */
export function regionColor(frame: Frame, region: Region): Rgb {
  const { width, height, data } = frame;

  const x1 = toPixel(region.left, width);
  const x2 = toPixel(region.right, width);
  const y1 = toPixel(region.top, height);
  const y2 = toPixel(region.bottom, height);

  // also false for NaN bounds
  if (!(x2 > x1 && y2 > y1)) {
    return BLACK;
  }

  let r = 0;
  let g = 0;
  let b = 0;

  for (let y = y1; y < y2; y++) {
    for (let x = x1; x < x2; x++) {
      const idx = (y * width + x) * CHANNELS;
      r += data[idx];
      g += data[idx + 1];
      b += data[idx + 2];
    }
  }

  const count = (x2 - x1) * (y2 - y1);

  return [Math.trunc(r / count), Math.trunc(g / count), Math.trunc(b / count)];
}

/**
 * Row stride of a raw GStreamer RGB buffer: rows are padded to 4 bytes.
 */
export function rgbStride(width: number): number {
  return Math.ceil((width * CHANNELS) / 4) * 4;
}

/**
 * Cuts a raw byte stream into frames.
 *
 * Chunks may split or join frames anywhere. Only the newest frame completed by
 * a chunk is returned; older ones in the same chunk are dropped.
 */
export class FrameAssembler {
  private readonly stride: number;
  private readonly frameBytes: number;
  private readonly pending: Buffer;
  private filled = 0;

  constructor(private readonly size: FrameSize, stride: number = rgbStride(size.width)) {
    if (stride < size.width * CHANNELS) {
      throw new RangeError(`Stride ${stride} is shorter than a ${size.width} pixel row`);
    }

    this.stride = stride;
    this.frameBytes = stride * size.height;
    this.pending = Buffer.alloc(this.frameBytes);
  }

  push(chunk: Uint8Array): Frame | null {
    let latest: Frame | null = null;
    let offset = 0;

    while (offset < chunk.length) {
      const take = Math.min(this.frameBytes - this.filled, chunk.length - offset);
      this.pending.set(chunk.subarray(offset, offset + take), this.filled);
      this.filled += take;
      offset += take;

      if (this.filled === this.frameBytes) {
        latest = this.unpack();
        this.filled = 0;
      }
    }

    return latest;
  }

  private unpack(): Frame {
    const { width, height } = this.size;
    const rowBytes = width * CHANNELS;
    const data = new Uint8Array(rowBytes * height);

    for (let row = 0; row < height; row++) {
      const start = row * this.stride;
      data.set(this.pending.subarray(start, start + rowBytes), row * rowBytes);
    }

    return { width, height, data };
  }
}
