// ============================================================================
// TENANT GATEWAY — Structured Logger
// JSON structured logging for the authorizer Lambda
// ============================================================================

import type { LogLevel } from './types';

interface LogContext {
  tenantId?: string;
  sub?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function log(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: 'tenant-gateway-authorizer',
    ...context,
  };

  // Filter out undefined values
  const clean = Object.fromEntries(
    Object.entries(entry).filter(([, v]) => v !== undefined)
  );

  if (level === 'error') {
    console.error(JSON.stringify(clean));
  } else if (level === 'warn') {
    console.warn(JSON.stringify(clean));
  } else {
    console.log(JSON.stringify(clean));
  }
}
