import { DEFAULT_DB_PATH, parseConfig } from '../src/config/env';
import { ValidationError } from '../src/engine/errors';

describe('parseConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.dbPath).toBe(DEFAULT_DB_PATH);
    expect(config.overdueDailyRate.toString()).toBe('0.001');
    expect(config.defaultDueDays).toBe(30);
    expect(config.currency).toBe('USD');
    expect(config.logLevel).toBe('warn');
  });

  it('reads every setting from the environment', () => {
    const config = parseConfig({
      INVOICE_DB_PATH: '/var/lib/ledger/test.db',
      INVOICE_OVERDUE_DAILY_RATE: '0.0025',
      INVOICE_DEFAULT_DUE_DAYS: '14',
      INVOICE_CURRENCY: 'EUR',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      dbPath: '/var/lib/ledger/test.db',
      defaultDueDays: 14,
      currency: 'EUR',
      logLevel: 'debug',
    });
    expect(config.overdueDailyRate.toString()).toBe('0.0025');
  });

  const invalidEnvironments: Array<[NodeJS.ProcessEnv, string]> = [
    [{ INVOICE_OVERDUE_DAILY_RATE: 'abc' }, 'INVOICE_OVERDUE_DAILY_RATE: Must be a non-negative decimal'],
    [{ INVOICE_OVERDUE_DAILY_RATE: '2' }, 'INVOICE_OVERDUE_DAILY_RATE: Must not exceed 1'],
    [{ INVOICE_CURRENCY: 'euro' }, 'INVOICE_CURRENCY: Must be a three-letter code'],
    [{ INVOICE_DEFAULT_DUE_DAYS: '' }, 'INVOICE_DEFAULT_DUE_DAYS: Must be a whole number of days'],
    [{ INVOICE_DEFAULT_DUE_DAYS: '7.5' }, 'INVOICE_DEFAULT_DUE_DAYS: Must be a whole number of days'],
    [{ INVOICE_DEFAULT_DUE_DAYS: '4000' }, 'INVOICE_DEFAULT_DUE_DAYS: Must not exceed 3650'],
    [{ LOG_LEVEL: 'loud' }, 'LOG_LEVEL: Must be one of error, warn, info, debug'],
  ];

  it.each(invalidEnvironments)('rejects %j', (env, message) => {
    expect(() => parseConfig(env)).toThrow(ValidationError);
    expect(() => parseConfig(env)).toThrow(message);
  });
});
