/**
 * Component loggers.
 *
 * Lines go to stderr as `[Component] message`: stdout carries hook and CLI
 * output that other programs parse. Debug lines appear only when
 * PLUGIN_RELAY_DEBUG=true.
 */

import { getSanitizer } from './OutputSanitizer.js';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env.PLUGIN_RELAY_DEBUG === 'true';
}

function sanitizeDetail(detail: unknown): unknown {
  const sanitizer = getSanitizer();
  if (typeof detail === 'string') {
    return sanitizer.sanitize(detail);
  }
  if (detail instanceof Error) {
    return sanitizer.sanitizeError(detail);
  }
  return detail;
}

export function createLogger(component: string): Logger {
  const write = (level: string, message: string, details: unknown[]): void => {
    const tag = level === 'info' ? `[${component}]` : `[${component}] ${level.toUpperCase()}`;
    console.error(`${tag} ${getSanitizer().sanitize(message)}`, ...details.map(sanitizeDetail));
  };

  return {
    debug: (message, ...details) => {
      if (isDebugEnabled()) {
        write('debug', message, details);
      }
    },
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details)
  };
}
