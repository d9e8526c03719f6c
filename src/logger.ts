import { pino, type Logger } from 'pino';

export type { Logger };

/**
 * Create the logger a provider writes to when the caller supplies none.
 * Silent unless `debug` is set.
 */
export function createLogger(debug = false): Logger {
  return pino({
    name: 'bunny-dns',
    level: debug ? 'debug' : 'silent',
  });
}

export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}
