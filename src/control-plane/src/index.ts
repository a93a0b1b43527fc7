/**
 * Tasklane Control Plane - Main Entry Point
 *
 * Wires stores, provider, poller and orchestrator, serves the API and
 * resumes unfinished tasks left by a previous process.
 */

import { getConfig, getLogger, toMillicredits } from './utils/index.js';
import { createApp } from './api/index.js';
import {
  AccountRepository,
  JobRepository,
  LedgerRepository,
  PriceRepository,
  TaskRepository,
} from './repositories/index.js';
import { KieProviderClient } from './integrations/provider/index.js';
import { EventBridgeNotificationChannel } from './integrations/notifications/index.js';
import {
  AccountService,
  JobOrchestrator,
  PricingResolver,
  TaskPoller,
  getModelCatalog,
  orchestratorOptionsFromConfig,
  pollerOptionsFromConfig,
} from './services/index.js';

const logger = getLogger();
const config = getConfig();

const accounts = new AccountRepository();
const ledger = new LedgerRepository();
const jobs = new JobRepository();
const tasks = new TaskRepository();
const catalog = getModelCatalog();

const provider = new KieProviderClient({
  baseUrl: config.provider.baseUrl,
  apiKey: config.provider.apiKey,
  timeoutMs: config.provider.requestTimeoutSeconds * 1000,
});

const poller = new TaskPoller(
  { tasks, jobs, ledger, provider, notifications: new EventBridgeNotificationChannel() },
  pollerOptionsFromConfig(config)
);

const orchestrator = new JobOrchestrator(
  {
    accounts,
    ledger,
    jobs,
    tasks,
    pricing: new PricingResolver(new PriceRepository()),
    catalog,
    provider,
    scheduler: poller,
  },
  orchestratorOptionsFromConfig(config)
);

const accountService = new AccountService(accounts, ledger, {
  signupBonus: toMillicredits(config.admission.signupBonusCredits),
});

const app = createApp({
  orchestrator,
  accounts: accountService,
  catalog,
  pollerStatus: () => poller.status(),
  apiToken: config.apiToken,
});

function startServer(): void {
  if (config.provider.apiKey === '') {
    logger.warn('PROVIDER_API_KEY is not set, provider calls will be rejected');
  }

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      {
        port: config.port,
        host: config.host,
        env: config.nodeEnv,
        models: catalog.list().length,
      },
      'Tasklane Control Plane started'
    );

    poller
      .recover()
      .then((count) => {
        if (count > 0) {
          logger.info({ count }, 'Resumed unfinished tasks');
        }
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Task recovery failed');
      });
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutdown signal received');

    server.close(() => {
      logger.info('HTTP server closed');
      poller
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, 'Poller shutdown failed');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

startServer();

export { app };
