import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import { type CaptureBackend, type CaptureHandlers, CaptureInitError } from './capture';
import { createFrame, type Frame, type FrameSize } from './frame';
import { describeError, logDebug, logWarning } from './logger';

const DEFAULT_FPS = 10;

export type Grabber = () => Promise<Buffer>;

const grabDesktop: Grabber = () => screenshot({ format: 'png' });

export interface ScreenshotCaptureOptions {
  fps?: number;
  grab?: Grabber;
}

/**
 * Polls full desktop screenshots and downsizes them to RGB frames.
 * A tick is skipped while the previous grab is still being decoded.
 */
export class ScreenshotCapture implements CaptureBackend {
  readonly name = 'screenshot';

  private debug = logDebug;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly size: FrameSize, private readonly options: ScreenshotCaptureOptions = {}) {}

  async start(handlers: CaptureHandlers): Promise<void> {
    if (this.timer) {
      throw new CaptureInitError('Screenshot capture is already running');
    }

    let first: Frame;
    try {
      first = await this.capture();
    } catch (error) {
      throw new CaptureInitError(`Could not take a screenshot: ${describeError(error)}`, { cause: error });
    }

    handlers.onFrame(first);

    const fps = this.options.fps ?? DEFAULT_FPS;
    this.timer = setInterval(() => this.tick(handlers), 1000 / fps);
    this.debug(`Screenshot capture running at ${fps} FPS`);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    await this.inFlight;
  }

  private tick(handlers: CaptureHandlers): void {
    if (this.inFlight) {
      return;
    }

    this.inFlight = this.capture()
      .then((frame) => {
        // stopped while grabbing
        if (this.timer) {
          handlers.onFrame(frame);
        }
      })
      .catch((error: unknown) => {
        logWarning(`Frame capture failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async capture(): Promise<Frame> {
    const grab = this.options.grab ?? grabDesktop;
    const image = await grab();

    const { data, info } = await sharp(image)
      .resize(this.size.width, this.size.height, { fit: 'fill' })
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return createFrame(info.width, info.height, data);
  }
}
