import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import { type CaptureBackend, type CaptureHandlers, CaptureInitError } from './capture';
import { FrameAssembler, type FrameSize } from './frame';
import { describeError, logDebug } from './logger';

export const GST_LAUNCH = 'gst-launch-1.0';

const STARTUP_GRACE_MS = 1_500;
const STOP_TIMEOUT_MS = 2_000;
const STDERR_TAIL_BYTES = 4_096;

/**
 * The parts of a child process the pipeline talks to.
 */
export interface CaptureProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type Spawner = (command: string, args: Array<string>) => CaptureProcess;

const defaultSpawner: Spawner = (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export interface GStreamerCaptureOptions {
  command?: string;
  /** How long the pipeline must stay up (without a frame) to count as started. */
  startupGraceMs?: number;
  stopTimeoutMs?: number;
  spawner?: Spawner;
}

/**
 * gst-launch arguments for a PipeWire screen cast scaled to `size`.
 *
 * media.role=Screen makes the desktop portal ask which screen or window to
 * share. The leaky single-buffer queue drops stale frames when stdout is
 * not drained fast enough.
 */
export function pipelineArgs({ width, height }: FrameSize): Array<string> {
  return [
    '-q',
    'pipewiresrc', 'stream-properties=properties,media.role=Screen',
    '!', 'videoconvert',
    '!', 'videoscale',
    '!', 'videoconvert',
    '!', `video/x-raw,format=RGB,width=${width},height=${height}`,
    '!', 'queue', 'leaky=downstream', 'max-size-buffers=1',
    '!', 'fdsink', 'fd=1', 'sync=false',
  ];
}

const lastLine = (text: string): string | undefined =>
  text.split('\n').map((line) => line.trim()).filter(Boolean).pop();

export class GStreamerCapture implements CaptureBackend {
  readonly name = 'gstreamer';

  private debug = logDebug;
  private child: CaptureProcess | null = null;
  private stopping = false;
  private exited: Promise<void> = Promise.resolve();

  constructor(private readonly size: FrameSize, private readonly options: GStreamerCaptureOptions = {}) {}

  start(handlers: CaptureHandlers): Promise<void> {
    if (this.child) {
      return Promise.reject(new CaptureInitError('Capture pipeline is already running'));
    }

    const command = this.options.command ?? GST_LAUNCH;
    const spawner = this.options.spawner ?? defaultSpawner;
    const graceMs = this.options.startupGraceMs ?? STARTUP_GRACE_MS;
    const assembler = new FrameAssembler(this.size);
    const args = pipelineArgs(this.size);

    this.stopping = false;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let finished = false;
      let stderrTail = '';
      let graceTimer: NodeJS.Timeout | null = null;
      let markExited: () => void = () => undefined;

      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }

        settled = true;
        if (graceTimer) {
          clearTimeout(graceTimer);
          graceTimer = null;
        }

        if (error) {
          reject(new CaptureInitError(error.message, { cause: error }));
          return;
        }

        this.debug(`${command} running`);
        resolve();
      };

      let child: CaptureProcess;
      try {
        this.debug(`Spawning ${command} ${args.join(' ')}`);
        child = spawner(command, args);
      } catch (error) {
        reject(new CaptureInitError(`Could not launch ${command}: ${describeError(error)}`, { cause: error }));
        return;
      }

      this.child = child;
      this.exited = new Promise<void>((done) => {
        markExited = done;
      });

      const finish = (error: Error): void => {
        if (finished) {
          return;
        }

        finished = true;
        if (this.child === child) {
          this.child = null;
        }
        markExited();

        if (!settled) {
          settle(error);
        } else if (!this.stopping) {
          handlers.onEnd(error);
        }
      };

      const streamFailed = (stream: string) => (error: Error): void => {
        finish(new Error(`Could not read ${command} ${stream}: ${error.message}`, { cause: error }));
        child.kill('SIGTERM');
      };

      child.stdout?.on('error', streamFailed('stdout'));
      child.stderr?.on('error', streamFailed('stderr'));

      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        if (this.stopping) {
          return;
        }

        const frame = assembler.push(chunk);
        if (frame) {
          settle();
          handlers.onFrame(frame);
        }
      });

      child.once('spawn', () => {
        graceTimer = setTimeout(() => settle(), graceMs);
      });

      child.on('error', (error: Error) => {
        finish(new Error(`Could not run ${command}: ${error.message}`, { cause: error }));
      });

      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const reason = signal ? `was killed by ${signal}` : `exited with code ${code ?? 'unknown'}`;
        const detail = lastLine(stderrTail);
        const hint = detail ? `: ${detail}` : '. Check that PipeWire and xdg-desktop-portal are running.';

        finish(new Error(`${command} ${reason}${hint}`));
      });
    });
  }

  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }

    this.stopping = true;
    child.kill('SIGTERM');

    const killTimer = setTimeout(() => {
      this.debug(`${GST_LAUNCH} ignored SIGTERM, killing`);
      child.kill('SIGKILL');
    }, this.options.stopTimeoutMs ?? STOP_TIMEOUT_MS);

    try {
      await this.exited;
    } finally {
      clearTimeout(killTimer);
    }
  }
}
