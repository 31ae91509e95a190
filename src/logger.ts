const isDebugEnabled = (): boolean => Boolean(process.env.HUECAST_DEBUG || process.env.DEBUG);

const stamp = (level: string, message: string): string => `[${level}] ${new Date().toISOString()}: ${message}`;

export function logWarning(message: string): void {
  console.warn(stamp('WARNING', message));
}

export function logError(message: string): void {
  console.error(stamp('ERROR', message));
}

export function logDebug(message: string): void {
  if (isDebugEnabled()) {
    console.debug(stamp('DEBUG', message));
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
