import { type CaptureBackend, type CaptureBackendFactory, CaptureInitError } from './capture';
import { GStreamerCapture } from './capture-gstreamer';
import { BLACK, type Rgb } from './colors';
import { type Frame, type FrameSize, regionColor } from './frame';
import { describeError, logDebug, logWarning } from './logger';

export const DEFAULT_FRAME_SIZE: FrameSize = { width: 160, height: 90 };

export interface FrameSamplerOptions extends Partial<FrameSize> {
  backend?: CaptureBackendFactory;
}

/**
 * Keeps the latest frame of a live screen capture and answers region color
 * queries against it.
 *
 * Frames are pushed by the backend and swap the `latest` reference whole; a
 * query always reads one complete frame, old or new.
 */
export class FrameSampler {
  private debug = logDebug;
  private latest: Frame | null = null;
  private ended: Error | null = null;
  private closing: Promise<void> | null = null;

  private constructor(readonly width: number, readonly height: number, private readonly backend: CaptureBackend) {}

  /**
   * Starts a capture of `width` x `height` frames.
   * Rejects with CaptureInitError when the backend cannot start; nothing is left running.
   */
  static async open(options: FrameSamplerOptions = {}): Promise<FrameSampler> {
    const width = options.width ?? DEFAULT_FRAME_SIZE.width;
    const height = options.height ?? DEFAULT_FRAME_SIZE.height;

    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid frame size ${width}x${height}`);
    }

    const size = { width, height };
    const backend = options.backend ? options.backend(size) : new GStreamerCapture(size);
    const sampler = new FrameSampler(width, height, backend);

    try {
      await backend.start({
        onFrame: (frame) => sampler.receive(frame),
        onEnd: (error) => sampler.fail(error),
      });
    } catch (error) {
      await sampler.close();

      if (error instanceof CaptureInitError) {
        throw error;
      }
      throw new CaptureInitError(`Capture backend ${backend.name} failed to start: ${describeError(error)}`, {
        cause: error,
      });
    }

    sampler.debug(`Sampling ${width}x${height} frames from ${backend.name}`);
    return sampler;
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  /** Set when the capture stopped by itself after starting. */
  get failure(): Error | null {
    return this.ended;
  }

  snapshot(): Frame | null {
    return this.latest;
  }

  /**
   * Mean color of the fractional rectangle in the latest frame.
   * Black before the first frame, after close, and for empty rectangles.
   */
  getRegionColor(left: number, top: number, right: number, bottom: number): Rgb {
    const frame = this.latest;
    if (!frame) {
      return BLACK;
    }

    return regionColor(frame, { left, top, right, bottom });
  }

  /**
   * Stops the capture, then drops the frame. Safe to call any number of times;
   * every call after the first returns the same promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }

    return this.closing;
  }

  private async shutdown(): Promise<void> {
    try {
      await this.backend.stop();
    } catch (error) {
      logWarning(`Error while stopping ${this.backend.name} capture: ${describeError(error)}`);
    }

    this.latest = null;
    this.debug('Sampler closed');
  }

  private receive(frame: Frame): void {
    if (this.closing) {
      return;
    }

    if (frame.width !== this.width || frame.height !== this.height) {
      this.debug(`Dropping ${frame.width}x${frame.height} frame, expected ${this.width}x${this.height}`);
      return;
    }

    this.latest = frame;
  }

  private fail(error: Error): void {
    logWarning(`Capture ${this.backend.name} stopped: ${error.message}`);
    this.ended = error;
  }
}

/**
 * Opens a sampler for the duration of `use` and always closes it afterwards.
 */
export async function withFrameSampler<T>(
  options: FrameSamplerOptions,
  use: (sampler: FrameSampler) => Promise<T>,
): Promise<T> {
  const sampler = await FrameSampler.open(options);

  try {
    return await use(sampler);
  } finally {
    await sampler.close();
  }
}
