import { setTimeout as delay } from 'timers/promises';

export function isAbortError (error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Waits `ms`; resolves `false` instead of throwing when `signal` aborts.
 */
export async function sleep (ms: number, signal?: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (isAbortError(error)) {
      return false;
    }
    throw error;
  }
}
