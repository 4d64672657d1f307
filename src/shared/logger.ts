import { DEBUG_ENV_VAR } from '../config/constants';

/**
 * Debug log to stderr. Silent unless HANDSHAKE_DEBUG is set.
 */
export function log(message: string, data?: Record<string, unknown>): void {
  if (!process.env[DEBUG_ENV_VAR]) return;
  const suffix = data ? ` ${JSON.stringify(data)}` : '';
  console.error(`[${new Date().toISOString()}] ${message}${suffix}`);
}
