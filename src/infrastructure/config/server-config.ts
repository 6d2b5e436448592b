import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const envSchema = z
  .object({
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    WEBHOOK_PATH: z.string().startsWith('/').default('/webhook'),
    WEBHOOK_SECRET: optionalString,
    WORKERS: z.coerce.number().int().positive().optional(),
    QUEUE_SIZE: z.coerce.number().int().positive().default(100),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    RULES_FILE: optionalString,
    RULES_DIR: optionalString,
    GITHUB_TOKEN: optionalString,
    SLACK_WEBHOOK_URL: optionalString,
    DISCORD_WEBHOOK_URL: optionalString,
    REDIS_URL: optionalString,
    SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  })
  .refine((env) => env.RULES_FILE !== undefined || env.RULES_DIR !== undefined, {
    message: 'RULES_FILE or RULES_DIR must be set',
    path: ['RULES_FILE'],
  });

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly webhookPath: string;
  readonly secret: string | undefined;
  /** Worker count; when unset the rule config's `max_concurrency` applies. */
  readonly workers: number | undefined;
  readonly queueSize: number;
  readonly logLevel: string;
  readonly rulesFile: string | undefined;
  readonly rulesDir: string | undefined;
  readonly githubToken: string | undefined;
  readonly slackWebhookUrl: string | undefined;
  readonly discordWebhookUrl: string | undefined;
  readonly redisUrl: string | undefined;
  readonly shutdownGraceMs: number;
}

/** Reads and validates the process environment. Throws `ConfigError`. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid environment: ${details}`);
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    webhookPath: e.WEBHOOK_PATH,
    secret: e.WEBHOOK_SECRET,
    workers: e.WORKERS,
    queueSize: e.QUEUE_SIZE,
    logLevel: e.LOG_LEVEL,
    rulesFile: e.RULES_FILE,
    rulesDir: e.RULES_DIR,
    githubToken: e.GITHUB_TOKEN,
    slackWebhookUrl: e.SLACK_WEBHOOK_URL,
    discordWebhookUrl: e.DISCORD_WEBHOOK_URL,
    redisUrl: e.REDIS_URL,
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
  };
}
