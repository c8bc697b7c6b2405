import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  BODY_LIMIT: z.string().min(1).default('10mb'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  DEFAULT_MAX_ASPECT_RATIO: z.coerce.number().positive().finite().default(5),
  NODE_ENV: z.string().default('production'),
});

export interface ServerConfig {
  port: number;
  /** Maximum JSON body size, in express/body-parser notation */
  bodyLimit: string;
  corsOrigin: string | string[];
  /** Used when a filter request leaves maxAspectRatio out */
  defaultMaxAspectRatio: number;
  development: boolean;
}

/**
 * Read server configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const { PORT, BODY_LIMIT, CORS_ORIGIN, DEFAULT_MAX_ASPECT_RATIO, NODE_ENV } = parsed.data;
  const origins = CORS_ORIGIN.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);

  return {
    port: PORT,
    bodyLimit: BODY_LIMIT,
    corsOrigin: origins.length === 1 ? origins[0] : origins,
    defaultMaxAspectRatio: DEFAULT_MAX_ASPECT_RATIO,
    development: NODE_ENV === 'development',
  };
}
