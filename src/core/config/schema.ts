import { z } from 'zod';

export const DEFAULT_REGISTRY_URL = 'https://api.github.com/licenses';
export const DEFAULT_USER_AGENT = 'lic-cli';

/** Treat unset and blank environment variables alike. */
function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => (typeof val === 'string' && val.trim() === '' ? undefined : val), schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Environment variables read at startup.
 */
export const EnvironmentSchema = z.object({
  /** License listing endpoint; a single license lives at `<url>/<key>` */
  LIC_REGISTRY_URL: blankAsUndefined(z.url().default(DEFAULT_REGISTRY_URL)),
  /** Value of the User-Agent header sent to the registry */
  LIC_USER_AGENT: blankAsUndefined(z.string().default(DEFAULT_USER_AGENT)),
  LIC_LOG_LEVEL: blankAsUndefined(LogLevelSchema.default('info')),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

export interface AppConfig {
  registryUrl: string;
  userAgent: string;
  logLevel: z.infer<typeof LogLevelSchema>;
}
