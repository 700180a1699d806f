import { z } from 'zod';

const commaSeparatedList = z
  .string()
  .transform((s) => s.split(',').map((v) => v.trim()).filter((v) => v.length > 0));

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s && s.length > 0 ? s : undefined));

const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DEFAULT_MODEL: z.string().min(1).default('gpt-3.5-turbo'),

  // Providers: at least one must be configured, validated separately below
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().optional(),
  AWS_REGION: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  CLAUDE_WEB_SESSION_KEY: optionalString,
  CLAUDE_WEB_TIMEZONE: z.string().default('Asia/Shanghai'),
  BARD_TOKEN: optionalString,
  TOGETHER_API_KEY: optionalString,
  TOGETHER_BASE_URL: z.string().url().optional(),

  // Persistence
  REDIS_URL: optionalString,

  // Telegram
  TELEGRAM_TOKEN: optionalString,
  TELEGRAM_ALLOWED_USERS: commaSeparatedList.default(''),
});

export type Config = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate an environment. Throws ConfigError listing every problem found.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration error:\n${errors}`);
  }

  const cfg = result.data;

  const aws = [cfg.AWS_REGION, cfg.AWS_ACCESS_KEY_ID, cfg.AWS_SECRET_ACCESS_KEY];
  if (aws.some(Boolean) && !aws.every(Boolean)) {
    throw new ConfigError(
      'Bedrock needs all of AWS_REGION, AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY'
    );
  }

  if (
    !cfg.OPENAI_API_KEY &&
    !cfg.AWS_REGION &&
    !cfg.CLAUDE_WEB_SESSION_KEY &&
    !cfg.BARD_TOKEN &&
    !cfg.TOGETHER_API_KEY
  ) {
    throw new ConfigError(
      'At least one provider is required:\n' +
        '  OPENAI_API_KEY, AWS_REGION (with AWS credentials), CLAUDE_WEB_SESSION_KEY, BARD_TOKEN or TOGETHER_API_KEY'
    );
  }

  return cfg;
}

/**
 * Load the process configuration, exiting with code 1 when it is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return parseConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    // eslint-disable-next-line no-console
    console.error(`\n[aienvoy] ${err.message}\n`);
    process.exit(1);
  }
}
