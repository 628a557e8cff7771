import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../config';
import { AppenderError } from '../appender/errors';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config.dialect).toBe('postgresql');
    expect(config.transactional).toBe(false);
    expect(config.onRowCountMismatch).toBe('warn');
    expect(config.capabilities).toEqual({});
    expect(config.level).toBe('DEBUG');
    expect(config.includeCallerData).toBe(true);
    expect(config.sqlitePath).toBe(path.join(process.cwd(), 'logging.test.db'));
    expect(config.postgres).toMatchObject({ host: 'localhost', port: 5432, database: 'logging' });
  });

  it('should read every setting from the environment', () => {
    const config = loadConfig({
      LOG_DB_DIALECT: 'sqlite',
      LOG_DB_SQLITE_PATH: '/var/log/app/events.db',
      LOG_DB_TRANSACTIONAL: 'true',
      LOG_DB_ON_ROW_MISMATCH: 'abort',
      LOG_DB_GENERATED_KEYS: 'false',
      LOG_DB_BATCH_UPDATES: '1',
      LOG_LEVEL: 'warn',
      LOG_CALLER_DATA: 'false',
      POSTGRES_HOST: 'db',
      POSTGRES_PORT: '6543',
      POSTGRES_PASSWORD: 'test-secret',
    });

    expect(config).toMatchObject({
      dialect: 'sqlite',
      sqlitePath: '/var/log/app/events.db',
      transactional: true,
      onRowCountMismatch: 'abort',
      capabilities: { generatedKeys: false, batchUpdates: true },
      level: 'WARN',
      includeCallerData: false,
      postgres: { host: 'db', port: 6543, password: 'test-secret' },
    });
  });

  it('should reject invalid values with invalid_config', () => {
    const cases = [
      { LOG_DB_DIALECT: 'oracle' },
      { LOG_DB_ON_ROW_MISMATCH: 'ignore' },
      { LOG_DB_TRANSACTIONAL: 'yes' },
      { LOG_LEVEL: 'verbose' },
      { POSTGRES_PORT: '54x' },
    ];

    for (const env of cases) {
      expect(() => loadConfig(env)).toThrow(AppenderError);
    }
    expect(() => loadConfig({ LOG_DB_DIALECT: 'oracle' })).toThrow(
      'LOG_DB_DIALECT=oracle is invalid, expected postgresql or sqlite'
    );
  });
});
