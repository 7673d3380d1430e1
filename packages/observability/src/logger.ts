export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogOptions {
  /** Write every level to stderr, keeping stdout for program output. */
  stderr?: boolean;
}

export function log(
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>,
  options: LogOptions = {}
): void {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    metadata: metadata ?? {}
  };

  const line = JSON.stringify(entry);
  if (level === 'error' || options.stderr) {
    console.error(line);
    return;
  }

  console.log(line);
}
