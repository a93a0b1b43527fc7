/**
 * Pino logger for the Tasklane control plane
 */

import pino from 'pino';
import { getConfig } from './config.js';

/** Identifiers bound to every line logged for one job or task */
export interface WorkContext {
  readonly jobId: string;
  readonly accountId: string;
  readonly taskId?: string;
}

// Provider keys and bearer tokens must never reach the log stream
const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'authorization',
  'apiKey',
  'apiToken',
  'token',
  'provider.apiKey',
];

function createLogger(): pino.Logger {
  const config = getConfig();

  const options: pino.LoggerOptions = {
    level: config.log.level,
    base: {
      service: 'tasklane-control-plane',
      version: process.env['npm_package_version'] ?? '1.0.0',
      env: config.nodeEnv,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACT_PATHS, remove: true },
  };

  if (!config.log.pretty || config.nodeEnv === 'production') {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    },
  });
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (loggerInstance === null) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export function createRequestLogger(requestId: string): pino.Logger {
  return getLogger().child({ requestId });
}

/**
 * Bind a unit of work to a service logger. The task id is left out for
 * job-level lines.
 */
export function workLogger(parent: pino.Logger, context: WorkContext): pino.Logger {
  return parent.child({
    jobId: context.jobId,
    accountId: context.accountId,
    ...(context.taskId !== undefined ? { taskId: context.taskId } : {}),
  });
}

// For testing
export function resetLogger(): void {
  loggerInstance = null;
}
