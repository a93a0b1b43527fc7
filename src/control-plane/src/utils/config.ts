/**
 * Configuration loader for the Tasklane control plane
 * Reads configuration from environment variables with validation
 */

import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

// z.coerce.boolean() turns the string "false" into true
const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value === '' ? fallback : ['true', '1', 'yes'].includes(value.toLowerCase())
    );

const ConfigSchema = z
  .object({
    // Server
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    apiToken: z.string().min(1).optional(),

    // AWS
    awsRegion: z.string().default('us-east-1'),

    // DynamoDB
    dynamodb: z.object({
      accountsTable: z.string().default('tasklane-accounts'),
      ledgerTable: z.string().default('tasklane-ledger'),
      idempotencyTable: z.string().default('tasklane-ledger-idempotency'),
      pricesTable: z.string().default('tasklane-prices'),
      jobsTable: z.string().default('tasklane-jobs'),
      tasksTable: z.string().default('tasklane-tasks'),
    }),

    // Compute provider
    provider: z.object({
      baseUrl: z.string().url().default('https://api.kie.ai/api/v1'),
      apiKey: z.string().default(''),
      requestTimeoutSeconds: z.coerce.number().int().min(1).max(600).default(60),
    }),

    // Job admission
    admission: z.object({
      maxOutputsPerRequest: z.coerce.number().int().min(1).max(16).default(4),
      perAccountMaxActiveJobs: z.coerce.number().int().min(1).default(2),
      dailySpendCapCredits: z.coerce.number().min(0).default(500),
      cooldownSeconds: z.coerce.number().min(0).default(5),
      maxPromptLength: z.coerce.number().int().min(1).default(20000),
      signupBonusCredits: z.coerce.number().min(0).default(3),
      adminFreeModeDefault: booleanFlag(true),
    }),

    // Task poller
    poller: z.object({
      globalConcurrency: z.coerce.number().int().min(1).max(1000).default(10),
      perAccountConcurrency: z.coerce.number().int().min(1).max(100).default(2),
      backoffSeconds: z.array(z.number().positive()).min(1).default([1, 2, 3, 5, 8, 13, 20]),
      maxWaitSeconds: z.coerce.number().positive().default(180),
      staleRunningSeconds: z.coerce.number().positive().default(600),
      rescheduleDelaySeconds: z.coerce.number().min(0).default(30),
    }),

    // Billing
    billing: z.object({
      refundOnFail: booleanFlag(true),
      partialRefunds: booleanFlag(false),
    }),

    // Result notifications
    notifications: z.object({
      eventBusName: z.string().default('default'),
      source: z.string().default('tasklane.control-plane'),
    }),

    // Logging
    log: z.object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: booleanFlag(false),
    }),
  })
  .refine(
    (config) =>
      config.poller.staleRunningSeconds >
      config.poller.maxWaitSeconds +
        Math.max(...config.poller.backoffSeconds) +
        config.provider.requestTimeoutSeconds,
    {
      message: 'must exceed POLL_MAX_WAIT_SECONDS plus the largest backoff step and PROVIDER_TIMEOUT_SECONDS',
      path: ['poller', 'staleRunningSeconds'],
    }
  )
  .refine((config) => config.nodeEnv !== 'production' || config.apiToken !== undefined, {
    message: 'API_TOKEN is required in production',
    path: ['apiToken'],
  });

export type Config = z.infer<typeof ConfigSchema>;

function parseNumberList(value: string | undefined): number[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map((s) => Number(s.trim()));
}

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env['NODE_ENV'],
    port: process.env['PORT'],
    host: process.env['HOST'],
    apiToken: process.env['API_TOKEN'],
    awsRegion: process.env['AWS_REGION'],
    dynamodb: {
      accountsTable: process.env['DYNAMODB_ACCOUNTS_TABLE'],
      ledgerTable: process.env['DYNAMODB_LEDGER_TABLE'],
      idempotencyTable: process.env['DYNAMODB_IDEMPOTENCY_TABLE'],
      pricesTable: process.env['DYNAMODB_PRICES_TABLE'],
      jobsTable: process.env['DYNAMODB_JOBS_TABLE'],
      tasksTable: process.env['DYNAMODB_TASKS_TABLE'],
    },
    provider: {
      baseUrl: process.env['PROVIDER_BASE_URL'],
      apiKey: process.env['PROVIDER_API_KEY'],
      requestTimeoutSeconds: process.env['PROVIDER_TIMEOUT_SECONDS'],
    },
    admission: {
      maxOutputsPerRequest: process.env['MAX_OUTPUTS_PER_REQUEST'],
      perAccountMaxActiveJobs: process.env['PER_ACCOUNT_MAX_ACTIVE_JOBS'],
      dailySpendCapCredits: process.env['DAILY_SPEND_CAP_CREDITS'],
      cooldownSeconds: process.env['GENERATE_COOLDOWN_SECONDS'],
      maxPromptLength: process.env['MAX_PROMPT_LENGTH'],
      signupBonusCredits: process.env['SIGNUP_BONUS_CREDITS'],
      adminFreeModeDefault: process.env['ADMIN_FREE_MODE_DEFAULT'],
    },
    poller: {
      globalConcurrency: process.env['GLOBAL_MAX_POLL_CONCURRENCY'],
      perAccountConcurrency: process.env['PER_ACCOUNT_MAX_POLL_CONCURRENCY'],
      backoffSeconds: parseNumberList(process.env['POLL_BACKOFF_SEQUENCE']),
      maxWaitSeconds: process.env['POLL_MAX_WAIT_SECONDS'],
      staleRunningSeconds: process.env['POLL_STALE_RUNNING_SECONDS'],
      rescheduleDelaySeconds: process.env['POLL_RESCHEDULE_DELAY_SECONDS'],
    },
    billing: {
      refundOnFail: process.env['REFUND_ON_FAIL'],
      partialRefunds: process.env['PARTIAL_REFUNDS'],
    },
    notifications: {
      eventBusName: process.env['EVENT_BUS_NAME'],
      source: process.env['EVENT_SOURCE'],
    },
    log: {
      level: process.env['LOG_LEVEL'],
      pretty: process.env['LOG_PRETTY'],
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (configInstance === null) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allows resetting config
export function resetConfig(): void {
  configInstance = null;
}
