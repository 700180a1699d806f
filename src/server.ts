import Fastify, { type FastifyInstance } from 'fastify';
import { type Config, loadConfig } from './config.js';
import { ModelRegistry } from './core/ModelRegistry.js';
import { ConversationService } from './core/ConversationService.js';
import { type ConversationStore, MemoryConversationStore } from './core/ConversationStore.js';
import { RedisConversationStore } from './core/RedisConversationStore.js';
import { type TokenCounter, TiktokenCounter, UsageRecorder } from './core/UsageRecorder.js';
import { createRedisClient } from './core/redis.js';
import { type ProviderAdapter } from './providers/base.js';
import { OpenAIAdapter } from './providers/openai.js';
import { BedrockAdapter } from './providers/bedrock.js';
import { ClaudeWebAdapter } from './providers/claudeweb.js';
import { BardAdapter } from './providers/bard.js';
import { TogetherAdapter } from './providers/together.js';
import { requestIdHook } from './middleware/requestId.js';
import { healthRoutes } from './routes/health.js';
import { createModelRoutes } from './routes/models.js';
import { createChatRoutes } from './routes/chat.js';
import { createConversationRoutes } from './routes/conversations.js';
import { createMessagesRoutes } from './routes/messages.js';
import { TelegramRelay, createTelegramBot } from './bot/telegram.js';
import { errorBody } from './utils/errors.js';
import { type Logger } from './utils/logger.js';

export interface AppOptions {
  config?: Config;
  /** Replaces the adapters built from the configuration */
  adapters?: ProviderAdapter[];
  /** Replaces the store chosen from REDIS_URL */
  store?: ConversationStore;
  tokenCounter?: TokenCounter;
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    conversations: ConversationService;
  }
}

/**
 * One adapter per configured provider, in resolution order.
 */
export function createAdapters(config: Config, logger: Logger): ProviderAdapter[] {
  const adapters: ProviderAdapter[] = [];

  if (config.OPENAI_API_KEY) {
    adapters.push(new OpenAIAdapter({ apiKey: config.OPENAI_API_KEY, baseUrl: config.OPENAI_BASE_URL, logger }));
  }
  if (config.AWS_REGION && config.AWS_ACCESS_KEY_ID && config.AWS_SECRET_ACCESS_KEY) {
    adapters.push(
      new BedrockAdapter({
        region: config.AWS_REGION,
        accessKeyId: config.AWS_ACCESS_KEY_ID,
        secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
        logger,
      })
    );
  }
  if (config.CLAUDE_WEB_SESSION_KEY) {
    adapters.push(
      new ClaudeWebAdapter({
        sessionKey: config.CLAUDE_WEB_SESSION_KEY,
        timezone: config.CLAUDE_WEB_TIMEZONE,
        logger,
      })
    );
  }
  if (config.BARD_TOKEN) {
    adapters.push(new BardAdapter({ token: config.BARD_TOKEN, logger }));
  }
  // Last: it claims every namespaced model name
  if (config.TOGETHER_API_KEY) {
    adapters.push(new TogetherAdapter({ apiKey: config.TOGETHER_API_KEY, baseUrl: config.TOGETHER_BASE_URL, logger }));
  }

  return adapters;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
    disableRequestLogging: false,
    trustProxy: true,
  });

  // ── Persistence ─────────────────────────────────────────────────────────

  let store = options.store;
  if (!store) {
    if (config.REDIS_URL) {
      const redis = createRedisClient(config.REDIS_URL);
      redis.on('error', (err: Error) => {
        fastify.log.warn({ err: err.message }, 'aienvoy: Redis connection error');
      });
      fastify.addHook('onClose', async () => {
        redis.disconnect();
      });
      store = new RedisConversationStore(redis);
      fastify.log.info('aienvoy: Redis store enabled');
    } else {
      store = new MemoryConversationStore();
    }
  }

  // ── Dependency injection ────────────────────────────────────────────────

  const registry = new ModelRegistry(options.adapters ?? createAdapters(config, fastify.log), fastify.log);
  const usage = new UsageRecorder(store, options.tokenCounter ?? new TiktokenCounter(), fastify.log);
  const service = new ConversationService({ registry, store, usage, logger: fastify.log });

  fastify.decorate('config', config);
  fastify.decorate('conversations', service);

  // ── Error handling ─────────────────────────────────────────────────────

  fastify.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        message: `Route ${request.method} ${request.url} not found`,
        type: 'invalid_request_error',
        code: 'not_found',
      },
    });
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    const { statusCode, body } = errorBody(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    } else {
      request.log.info({ statusCode, err: error.message }, 'Request failed');
    }
    return reply.status(statusCode).send(body);
  });

  // ── Routes ──────────────────────────────────────────────────────────────

  fastify.addHook('onRequest', requestIdHook);

  await fastify.register(healthRoutes);
  await fastify.register(createModelRoutes(registry));
  await fastify.register(createChatRoutes(service));
  await fastify.register(createConversationRoutes(service));
  await fastify.register(createMessagesRoutes(service));

  return fastify;
}

// ── Entrypoint ──────────────────────────────────────────────────────────────

if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  const app = await buildApp();
  const { config } = app;

  const bot = config.TELEGRAM_TOKEN
    ? createTelegramBot(
        config.TELEGRAM_TOKEN,
        new TelegramRelay({
          service: app.conversations,
          model: config.DEFAULT_MODEL,
          allowedUsers: config.TELEGRAM_ALLOWED_USERS,
          logger: app.log,
        }),
        app.log
      )
    : null;

  if (bot) {
    app.addHook('onClose', async () => {
      await bot.stop();
    });
  }

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    app.log.info(`aienvoy listening on ${config.HOST}:${config.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  // Long polling runs until the bot is stopped
  bot
    ?.start({ onStart: (me) => app.log.info({ bot: me.username }, 'telegram bot started') })
    .catch((err: unknown) => {
      app.log.error({ err: err instanceof Error ? err.message : String(err) }, 'telegram bot stopped');
    });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err);
          process.exit(1);
        }
      );
    });
  }
}
