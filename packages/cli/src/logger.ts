import pino, { type Logger } from 'pino';

export type { Logger };

/**
 * Logger for the protoc plugin. Writes to stderr: stdout carries the
 * encoded CodeGeneratorResponse.
 */
export function createLogger(level: string = process.env.CACHE_MANAGER_LOG_LEVEL ?? 'warn'): Logger {
  return pino(
    { name: 'protoc-gen-cache-manager', level },
    pino.destination({ dest: 2, sync: true }),
  );
}
