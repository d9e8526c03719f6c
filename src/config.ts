import { z } from 'zod';
import { BunnyError } from './errors.js';
import type { Logger } from './logger.js';

export const BUNNY_API = 'https://api.bunny.net';

export interface BunnyOptions {
  /** Bunny.net account API key (Account settings → API) */
  accessKey: string;
  /** Override the API origin, e.g. for a recording proxy */
  baseUrl?: string;
  /** Log requests and decisions at debug level when no logger is given */
  debug?: boolean;
  /** Logger to write to instead of the built-in one */
  logger?: Logger;
}

const optionsSchema = z.object({
  accessKey: z
    .string({ required_error: 'accessKey is required' })
    .trim()
    .min(1, 'accessKey is required'),
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .transform((url) => url.replace(/\/+$/, ''))
    .default(BUNNY_API),
  debug: z.boolean().default(false),
});

export type ResolvedOptions = z.output<typeof optionsSchema> & {
  logger?: Logger;
};

/** Validate provider options, filling in defaults */
export function resolveOptions(options: BunnyOptions): ResolvedOptions {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => i.message).join(', ');
    throw new BunnyError('InvalidArgument', `Bunny: ${message}`, {
      cause: parsed.error,
    });
  }
  return { ...parsed.data, logger: options.logger };
}

/**
 * Read provider options from environment variables:
 * `BUNNY_API_KEY`, `BUNNY_API_URL` and `BUNNY_DEBUG` (`1` or `true`).
 */
export function bunnyOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): BunnyOptions {
  const debug = env.BUNNY_DEBUG?.toLowerCase();
  return {
    accessKey: env.BUNNY_API_KEY ?? '',
    baseUrl: env.BUNNY_API_URL || undefined,
    debug: debug === '1' || debug === 'true',
  };
}
