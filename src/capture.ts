import type { Frame, FrameSize } from './frame';

export interface CaptureHandlers {
  /** Called on every decoded frame, newest first wins. */
  onFrame(frame: Frame): void;
  /** Called when the source stops on its own after a successful start. */
  onEnd(error: Error): void;
}

/**
 * A screen capture source pushing downscaled RGB frames.
 */
export interface CaptureBackend {
  readonly name: string;
  /** Resolves once the source runs; rejects with CaptureInitError otherwise. */
  start(handlers: CaptureHandlers): Promise<void>;
  stop(): Promise<void>;
}

export type CaptureBackendFactory = (size: FrameSize) => CaptureBackend;

export const CAPTURE_BACKENDS = ['gstreamer', 'screenshot'] as const;

export type CaptureBackendName = (typeof CAPTURE_BACKENDS)[number];

export class CaptureInitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CaptureInitError';
  }
}
