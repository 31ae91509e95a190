import type { Bridge } from './bridge';
import { CAPTURE_BACKENDS, type CaptureBackendFactory, type CaptureBackendName } from './capture';
import { GStreamerCapture } from './capture-gstreamer';
import { ScreenshotCapture } from './capture-screenshot';
import { formatRgb, type Rgb, rgbToXy } from './colors';
import { resolveConfigPath, saveConfig } from './config';
import { type FrameSize, FULL_FRAME, type Region } from './frame';
import { describeError, logDebug } from './logger';
import { DEFAULT_FRAME_SIZE, withFrameSampler } from './sampler';
import { DEFAULT_INTERVAL_MS, runScreenSync, sampleRegion } from './screen-sync';
import { openBridge } from './session';
import { sleep } from './utils';
import {
  assertUnreachable,
  channelSchema,
  intervalSchema,
  nonBlankSchema,
  regionSchema,
  sizeSchema,
} from './validations';
import { z } from 'zod';

export const USAGE = `Usage:
  huecast list
  huecast set <light-id> rgb <r> <g> <b>
  huecast set <light-id> off
  huecast screen <light-id> [--region l,t,r,b] [--size WxH] [--interval ms] [--backend gstreamer|screenshot]
  huecast sample [--region l,t,r,b] [--size WxH] [--interval ms] [--backend gstreamer|screenshot]
  huecast config <host> <app-key>
  huecast help`;

const CENTER_REGION: Region = { left: 0.4, top: 0.4, right: 0.6, bottom: 0.6 };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface SamplingOptions {
  region: Region;
  size: FrameSize;
  intervalMs: number;
  backend: CaptureBackendName;
}

export type Command =
  | { name: 'help' }
  | { name: 'list' }
  | { name: 'set-rgb'; lightId: string; rgb: Rgb }
  | { name: 'set-off'; lightId: string }
  | { name: 'screen'; lightId: string; sampling: SamplingOptions }
  | { name: 'sample'; sampling: SamplingOptions }
  | { name: 'config'; host: string; appKey: string };

const SAMPLING_FLAGS = ['region', 'size', 'interval', 'backend'] as const;

type SamplingFlag = (typeof SAMPLING_FLAGS)[number];

const isSamplingFlag = (flag: string): flag is SamplingFlag => SAMPLING_FLAGS.some((known) => known === flag);

function parseValue<T> (schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string | undefined, label: string): T {
  if (value === undefined) {
    throw new UsageError(`Missing ${label}`);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join(', ');
    throw new UsageError(`Invalid ${label} "${value}": ${reason}`);
  }

  return result.data;
}

interface SplitArgs {
  positionals: Array<string>;
  flags: Partial<Record<SamplingFlag, string>>;
}

function splitArgs (args: Array<string>): SplitArgs {
  const positionals: Array<string> = [];
  const flags: SplitArgs['flags'] = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq > 0 ? arg.slice(2, eq) : arg.slice(2);

    if (!isSamplingFlag(flag)) {
      throw new UsageError(`Unknown option ${arg}`);
    }

    const value = eq > 0 ? arg.slice(eq + 1) : args[++i];
    if (value === undefined) {
      throw new UsageError(`Option --${flag} needs a value`);
    }

    flags[flag] = value;
  }

  return { positionals, flags };
}

function parseSampling (flags: SplitArgs['flags'], defaultRegion: Region): SamplingOptions {
  const backend = flags.backend ?? 'gstreamer';

  return {
    region: flags.region === undefined ? defaultRegion : parseValue(regionSchema, flags.region, 'region'),
    size: flags.size === undefined ? DEFAULT_FRAME_SIZE : parseValue(sizeSchema, flags.size, 'size'),
    intervalMs: flags.interval === undefined ? DEFAULT_INTERVAL_MS : parseValue(intervalSchema, flags.interval, 'interval'),
    backend: parseValue(z.enum(CAPTURE_BACKENDS), backend, 'backend'),
  };
}

function expectArity (positionals: Array<string>, count: number, command: string): void {
  if (positionals.length !== count) {
    throw new UsageError(`"${command}" expects ${count - 1} argument(s), got ${positionals.length - 1}`);
  }
}

export function parseArgs (argv: Array<string>): Command {
  const { positionals, flags } = splitArgs(argv);
  const name: string | undefined = positionals[0];
  const rest = positionals.slice(1);
  const usesFlags = Object.keys(flags).length > 0;

  if (usesFlags && name !== 'screen' && name !== 'sample') {
    throw new UsageError(`"${name ?? ''}" takes no options`);
  }

  switch (name) {
    case undefined:
    case 'help':
      return { name: 'help' };

    case 'list':
      expectArity(positionals, 1, name);
      return { name: 'list' };

    case 'set': {
      const lightId: string | undefined = rest[0];
      const mode: string | undefined = rest[1];
      const id = parseValue(nonBlankSchema, lightId, 'light id');

      if (mode === 'off') {
        expectArity(positionals, 3, 'set off');
        return { name: 'set-off', lightId: id };
      }

      if (mode === 'rgb') {
        expectArity(positionals, 6, 'set rgb');
        const [, , r, g, b] = rest;
        const rgb: Rgb = [
          parseValue(channelSchema, r, 'red'),
          parseValue(channelSchema, g, 'green'),
          parseValue(channelSchema, b, 'blue'),
        ];
        return { name: 'set-rgb', lightId: id, rgb };
      }

      throw new UsageError(`Unknown state "${mode ?? ''}", expected "rgb" or "off"`);
    }

    case 'screen':
      expectArity(positionals, 2, name);
      return {
        name: 'screen',
        lightId: parseValue(nonBlankSchema, rest[0], 'light id'),
        sampling: parseSampling(flags, FULL_FRAME),
      };

    case 'sample':
      expectArity(positionals, 1, name);
      return { name: 'sample', sampling: parseSampling(flags, CENTER_REGION) };

    case 'config':
      expectArity(positionals, 3, name);
      return {
        name: 'config',
        host: parseValue(nonBlankSchema, rest[0], 'host'),
        appKey: parseValue(nonBlankSchema, rest[1], 'app key'),
      };

    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  openBridge?: (configPath: string) => Promise<Bridge>;
  createBackend?: (sampling: SamplingOptions) => CaptureBackendFactory;
  /** Ends `screen` and `sample`; SIGINT and SIGTERM are used when absent. */
  signal?: AbortSignal;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createBackend ({ backend, intervalMs }: SamplingOptions): CaptureBackendFactory {
  switch (backend) {
    case 'gstreamer':
      return (size) => new GStreamerCapture(size);
    case 'screenshot':
      return (size) => new ScreenshotCapture(size, { fps: 1000 / intervalMs });
    default:
      return assertUnreachable('Unknown capture backend', backend);
  }
}

/**
 * Runs `use` with a signal that aborts on SIGINT or SIGTERM, unless the
 * caller supplied its own.
 */
async function withInterrupt<T> (signal: AbortSignal | undefined, use: (signal: AbortSignal) => Promise<T>): Promise<T> {
  if (signal) {
    return use(signal);
  }

  const controller = new AbortController();
  const abort = (): void => controller.abort();

  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    return await use(controller.signal);
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

const describeRegion = ({ left, top, right, bottom }: Region): string => `${left},${top},${right},${bottom}`;

async function execute (command: Command, deps: CliDependencies, io: CliIO): Promise<void> {
  const configPath = resolveConfigPath(deps.env ?? process.env, deps.cwd ?? process.cwd());
  const connect = (): Promise<Bridge> =>
    deps.openBridge ? deps.openBridge(configPath) : openBridge(configPath, { env: deps.env });
  const backendFor = deps.createBackend ?? createBackend;

  switch (command.name) {
    case 'help':
      io.out(USAGE);
      return;

    case 'list': {
      const bridge = await connect();
      const lights = await bridge.listLights();

      if (lights.length === 0) {
        io.out('No lights found.');
      }
      lights.forEach((light) => io.out(`${light.id}: ${light.name}`));
      return;
    }

    case 'set-rgb': {
      const bridge = await connect();
      const [r, g, b] = command.rgb;

      await bridge.setLightColor(command.lightId, rgbToXy(r, g, b), true);
      io.out(`Set light ${command.lightId} to rgb(${r},${g},${b})`);
      return;
    }

    case 'set-off': {
      const bridge = await connect();

      await bridge.setLightPower(command.lightId, false);
      io.out(`Turned light ${command.lightId} off`);
      return;
    }

    case 'screen': {
      const { lightId, sampling } = command;
      const bridge = await connect();
      const light = await bridge.getLight(lightId);

      await withInterrupt(deps.signal, (signal) =>
        withFrameSampler({ ...sampling.size, backend: backendFor(sampling) }, async (sampler) => {
          io.out(`Syncing ${light.name} (${light.id}) with screen region ${describeRegion(sampling.region)}. Press Ctrl+C to stop.`);

          const updates = await runScreenSync(sampler, bridge, {
            lightId,
            region: sampling.region,
            intervalMs: sampling.intervalMs,
            signal,
            onColor: (rgb, xy) => logDebug(`${formatRgb(rgb)} -> xy(${xy.x.toFixed(4)}, ${xy.y.toFixed(4)})`),
          });

          io.out(`Stopped after ${updates} updates.`);
        }),
      );
      return;
    }

    case 'sample': {
      const { sampling } = command;

      await withInterrupt(deps.signal, (signal) =>
        withFrameSampler({ ...sampling.size, backend: backendFor(sampling) }, async (sampler) => {
          do {
            const color = sampleRegion(sampler, sampling.region);
            io.out(`Region color: ${formatRgb(color)}`);
          } while (!signal.aborted && (await sleep(sampling.intervalMs, signal)));
        }),
      );
      return;
    }

    case 'config': {
      await saveConfig(configPath, { host: command.host, appKey: command.appKey });
      io.out(`Saved hub ${command.host} to ${configPath}`);
      return;
    }

    default:
      assertUnreachable('Unhandled command', command);
  }
}

/**
 * Parses and runs one command line. Resolves the process exit code:
 * 0 on success, 1 on a runtime failure, 2 on bad usage.
 */
export async function run (argv: Array<string>, deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? consoleIO;

  let command: Command;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(error.message);
      io.err(USAGE);
      return 2;
    }
    throw error;
  }

  try {
    await execute(command, deps, io);
    return 0;
  } catch (error) {
    io.err(`Error: ${describeError(error)}`);
    return 1;
  }
}
