import { Octokit } from '@octokit/rest';
import type { WebhookEvent } from './domain/index.js';
import { RuleEngine } from './application/index.js';
import {
  EventQueue,
  WorkerPool,
  createLogger,
  createRuleReloader,
  loadRules,
  loadServerConfig,
  registerDefaultHandlers,
  resolveNotificationUrls,
  startRuleSubscriber,
} from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Environment + rule files
 * 2) Engine, handlers, rules
 * 3) Queue + worker pool
 * 4) HTTP server, shutdown hooks, listen()
 * 5) Rule reload triggers (SIGHUP, Redis)
 */
async function main(): Promise<void> {

  const config = loadServerConfig();
  const log = createLogger(config.logLevel);

  // --------------------------------------------------
  // Rules
  // --------------------------------------------------

  const sources = { file: config.rulesFile, dir: config.rulesDir };
  const loaded = await loadRules(sources);

  log.info(
    { ruleCount: loaded.rules.length, file: sources.file, dir: sources.dir },
    'Rule configuration loaded',
  );

  if (!config.secret) {
    log.warn('WEBHOOK_SECRET is not set, webhook signatures will not be verified');
  }

  // --------------------------------------------------
  // Engine + handlers
  // --------------------------------------------------

  const engine = new RuleEngine(log);

  if (!config.githubToken) {
    log.warn('GITHUB_TOKEN is not set, GitHub actions will run unauthenticated');
  }
  const octokit = new Octokit({
    ...(config.githubToken ? { auth: config.githubToken } : {}),
    userAgent: 'hookflow',
  });

  const notificationUrls = resolveNotificationUrls(loaded.config.global.notification_urls, process.env);
  if (config.slackWebhookUrl) notificationUrls['slack'] = config.slackWebhookUrl;
  if (config.discordWebhookUrl) notificationUrls['discord'] = config.discordWebhookUrl;

  registerDefaultHandlers(engine, { octokit, log, notificationUrls });

  // Handlers first: rule validation checks action parameters against them.
  engine.replaceRules(loaded.rules);

  // --------------------------------------------------
  // Queue + workers
  // --------------------------------------------------

  const queue = new EventQueue<WebhookEvent>(config.queueSize);
  const pool = new WorkerPool(queue, engine, log, {
    workers: config.workers ?? loaded.config.global.max_concurrency,
  });

  const running = new AbortController();
  pool.start(running.signal);

  // --------------------------------------------------
  // HTTP
  // --------------------------------------------------

  const fastify = await buildServer({
    logger: log,
    engine,
    queue,
    webhookPath: config.webhookPath,
    secret: config.secret,
  });

  let cleanupSubscriber: null | (() => Promise<void>) = null;

  /**
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    running.abort();
    await pool.stop(config.shutdownGraceMs);

    if (engine.pendingActions > 0) {
      log.warn({ pending: engine.pendingActions }, 'Async actions still running at shutdown');
    }

    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  await fastify.listen({ host: config.host, port: config.port });

  log.info(
    { path: config.webhookPath, workers: config.workers ?? loaded.config.global.max_concurrency },
    'Webhook server ready',
  );

  // --------------------------------------------------
  // Rule reload
  // --------------------------------------------------

  const reload = createRuleReloader(() => loadRules(sources), engine, log);

  process.on('SIGHUP', () => {
    void reload('SIGHUP');
  });

  if (config.redisUrl) {
    cleanupSubscriber = await startRuleSubscriber(config.redisUrl, log, reload, running.signal);
  }

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info({ signal }, 'Shutting down');
    void fastify.close().then(
      () => {
        log.info('Server stopped');
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  const log = createLogger('fatal');
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
