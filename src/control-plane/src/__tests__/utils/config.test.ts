/**
 * Config utility tests
 */

import { getConfig, resetConfig } from '../../utils/config.js';

const OVERRIDDEN = [
  'PORT',
  'LOG_LEVEL',
  'API_TOKEN',
  'POLL_BACKOFF_SEQUENCE',
  'POLL_MAX_WAIT_SECONDS',
  'POLL_STALE_RUNNING_SECONDS',
  'PROVIDER_TIMEOUT_SECONDS',
  'REFUND_ON_FAIL',
  'PARTIAL_REFUNDS',
  'ADMIN_FREE_MODE_DEFAULT',
] as const;

describe('Config', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    resetConfig();
    for (const name of OVERRIDDEN) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
    process.env['NODE_ENV'] = 'test';
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    process.env['NODE_ENV'] = 'test';
    resetConfig();
  });

  it('should load default configuration', () => {
    const config = getConfig();

    expect(config.nodeEnv).toBe('test');
    expect(config.port).toBe(3000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.awsRegion).toBe('us-east-1');
    expect(config.apiToken).toBeUndefined();
  });

  it('should return same instance on subsequent calls', () => {
    const config1 = getConfig();
    const config2 = getConfig();

    expect(config1).toBe(config2);
  });

  it('should have nested configuration objects', () => {
    const config = getConfig();

    expect(config.dynamodb.jobsTable).toBe('tasklane-jobs');
    expect(config.dynamodb.tasksTable).toBe('tasklane-tasks');
    expect(config.dynamodb.ledgerTable).toBe('tasklane-ledger');
    expect(config.admission.maxOutputsPerRequest).toBe(4);
    expect(config.poller.backoffSeconds).toEqual([1, 2, 3, 5, 8, 13, 20]);
    expect(config.poller.maxWaitSeconds).toBe(180);
    expect(config.billing).toEqual({ refundOnFail: true, partialRefunds: false });
  });

  it('should respect environment variable overrides', () => {
    process.env['PORT'] = '8080';
    process.env['LOG_LEVEL'] = 'debug';

    const config = getConfig();

    expect(config.port).toBe(8080);
    expect(config.log.level).toBe('debug');
  });

  it('should read boolean flags literally', () => {
    process.env['REFUND_ON_FAIL'] = 'false';
    process.env['PARTIAL_REFUNDS'] = 'YES';
    process.env['ADMIN_FREE_MODE_DEFAULT'] = '0';

    const config = getConfig();

    expect(config.billing.refundOnFail).toBe(false);
    expect(config.billing.partialRefunds).toBe(true);
    expect(config.admission.adminFreeModeDefault).toBe(false);
  });

  it('should parse the poll backoff sequence', () => {
    process.env['POLL_BACKOFF_SEQUENCE'] = '2, 4,8';

    expect(getConfig().poller.backoffSeconds).toEqual([2, 4, 8]);
  });

  it('should reject a stale threshold that a healthy poll could reach', () => {
    process.env['POLL_MAX_WAIT_SECONDS'] = '600';
    process.env['POLL_STALE_RUNNING_SECONDS'] = '600';

    expect(() => getConfig()).toThrow('poller.staleRunningSeconds');
  });

  it('should count one provider request timeout towards the stale threshold', () => {
    process.env['POLL_MAX_WAIT_SECONDS'] = '180';
    process.env['POLL_BACKOFF_SEQUENCE'] = '1,20';
    process.env['PROVIDER_TIMEOUT_SECONDS'] = '60';
    process.env['POLL_STALE_RUNNING_SECONDS'] = '260';

    expect(() => getConfig()).toThrow('PROVIDER_TIMEOUT_SECONDS');

    resetConfig();
    process.env['POLL_STALE_RUNNING_SECONDS'] = '261';

    expect(getConfig().poller.staleRunningSeconds).toBe(261);
  });

  it('should require an API token in production', () => {
    process.env['NODE_ENV'] = 'production';

    expect(() => getConfig()).toThrow('API_TOKEN is required in production');

    resetConfig();
    process.env['API_TOKEN'] = 'test-secret';

    expect(getConfig().apiToken).toBe('test-secret');
  });
});
