import { EnvironmentSchema, type AppConfig } from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      ErrorCodes.INVALID_ENVIRONMENT,
      `Invalid environment configuration: ${problems.join('; ')}`,
      { issues: problems }
    );
  }

  return {
    registryUrl: result.data.LIC_REGISTRY_URL.replace(/\/+$/, ''),
    userAgent: result.data.LIC_USER_AGENT,
    logLevel: result.data.LIC_LOG_LEVEL,
  };
}
