import { parseDatabaseConfig, toSequelizeOptions } from './database.config';

describe('parseDatabaseConfig', () => {
  it('should apply defaults when nothing is set', () => {
    expect(parseDatabaseConfig({})).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'project_db',
      username: 'postgres',
      password: '',
      poolSize: 10,
      maxOverflow: 20,
      poolTimeout: 30,
      poolRecycle: 3600,
      sslMode: 'prefer',
      connectTimeout: 10,
      synchronize: false,
    });
  });

  it('should read and convert environment values', () => {
    const config = parseDatabaseConfig({
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_NAME: 'archive',
      DB_USER: 'archiver',
      DB_PASSWORD: 'test-secret',
      DB_POOL_SIZE: '4',
      DB_MAX_OVERFLOW: '0',
      DB_POOL_TIMEOUT: '5',
      DB_SSL_MODE: 'require',
      DB_SYNCHRONIZE: 'true',
    });

    expect(config.host).toBe('db.internal');
    expect(config.port).toBe(6543);
    expect(config.database).toBe('archive');
    expect(config.username).toBe('archiver');
    expect(config.password).toBe('test-secret');
    expect(config.poolSize).toBe(4);
    expect(config.maxOverflow).toBe(0);
    expect(config.poolTimeout).toBe(5);
    expect(config.sslMode).toBe('require');
    expect(config.synchronize).toBe(true);
  });

  it.each([
    ['DB_PORT', '70000'],
    ['DB_PORT', 'not-a-port'],
    ['DB_POOL_SIZE', '0'],
    ['DB_MAX_OVERFLOW', '-1'],
    ['DB_SSL_MODE', 'sometimes'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => parseDatabaseConfig({ [key]: value })).toThrow(
      `Invalid database configuration: ${key}`,
    );
  });
});

describe('toSequelizeOptions', () => {
  it('should size the pool from size plus overflow and converts seconds', () => {
    const options = toSequelizeOptions(
      parseDatabaseConfig({
        DB_POOL_SIZE: '5',
        DB_MAX_OVERFLOW: '3',
        DB_POOL_TIMEOUT: '2',
        DB_POOL_RECYCLE: '60',
        DB_CONNECT_TIMEOUT: '4',
      }),
    );

    expect(options.dialect).toBe('postgres');
    expect(options.pool).toEqual({
      max: 8,
      min: 0,
      acquire: 2000,
      idle: 60000,
    });
    expect(options.dialectOptions).toEqual({
      ssl: false,
      connectionTimeoutMillis: 4000,
    });
  });

  it.each([
    ['disable', false],
    ['prefer', false],
    ['require', { rejectUnauthorized: false }],
    ['verify-full', { rejectUnauthorized: true }],
  ])('should map ssl mode %s', (mode, expected) => {
    const options = toSequelizeOptions(
      parseDatabaseConfig({ DB_SSL_MODE: mode }),
    );

    expect(options.dialectOptions).toEqual({
      ssl: expected,
      connectionTimeoutMillis: 10000,
    });
  });
});
