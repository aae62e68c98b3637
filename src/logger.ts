import { AsyncLocalStorage } from 'node:async_hooks';
import type { LogLevel } from './types.js';

export type LogCallback = (level: LogLevel, message: string, url?: string) => void;

const logCallbackStorage = new AsyncLocalStorage<LogCallback | null>();
let fallbackLogCallback: LogCallback | null = null;

export function setLogCallback(callback: LogCallback | null): void {
  fallbackLogCallback = callback;
}

export function runWithLogCallback<T>(callback: LogCallback | null, fn: () => Promise<T>): Promise<T> {
  return logCallbackStorage.run(callback, fn);
}

function getLogCallback(): LogCallback | null {
  const scoped = logCallbackStorage.getStore();
  return scoped === undefined || scoped === null ? fallbackLogCallback : scoped;
}

function emit(level: LogLevel, message: string, url?: string): void {
  const callback = getLogCallback();
  if (callback) {
    callback(level, message, url);
    return;
  }
  switch (level) {
    case 'debug':
      if (process.env.DEBUG_CRAWL === '1') console.log('[debug]', message);
      break;
    case 'info':
      console.log('[info]', message);
      break;
    case 'warn':
      console.warn('[warn]', message);
      break;
    case 'error':
      console.error('[error]', message);
      break;
  }
}

export const log = {
  debug: (message: string, url?: string) => emit('debug', message, url),
  info: (message: string, url?: string) => emit('info', message, url),
  warn: (message: string, url?: string) => emit('warn', message, url),
  error: (message: string, url?: string) => emit('error', message, url)
};
