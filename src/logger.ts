export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogOptions {
  requestId?: string;
  data?: unknown;
  durationMs?: number;
}

let debugEnabled = false;

export function configureLogging(options: { debug: boolean }): void {
  debugEnabled = options.debug;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function structuredLog(
  level: LogLevel,
  category: string,
  message: string,
  options?: LogOptions
): void {
  if (level === 'debug' && !debugEnabled) return;

  const prefix = options?.requestId ? `[${options.requestId}] ` : '';
  const duration = options?.durationMs !== undefined ? ` (${String(options.durationMs)}ms)` : '';
  const line = `${prefix}${category}: ${message}${duration}`;

  switch (level) {
    case 'debug':
      console.log(`[DEBUG] ${line}`);
      if (options?.data !== undefined) console.log(JSON.stringify(options.data, null, 2));
      break;
    case 'info':
      console.log(`[INFO] ${line}`);
      break;
    case 'warn':
      console.warn(`[WARN] ${line}`);
      break;
    case 'error':
      console.error(`[ERROR] ${line}`);
      if (options?.data !== undefined) console.error(options.data);
      break;
  }
}
