import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should apply defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      CORS_ORIGIN: undefined,
      DB_TYPE: 'postgres',
      DB_HOST: 'localhost',
      DB_PORT: 5432,
      DB_USERNAME: undefined,
      DB_PASSWORD: undefined,
      DB_DATABASE: 'd0010',
      DB_SQLITE_PATH: 'd0010.sqlite',
      DB_SYNCHRONIZE: true,
    });
  });

  it('should coerce numeric and boolean strings', () => {
    const env = validateEnv({
      PORT: '8080',
      DB_PORT: '6543',
      DB_SYNCHRONIZE: '0',
    });

    expect(env.PORT).toBe(8080);
    expect(env.DB_PORT).toBe(6543);
    expect(env.DB_SYNCHRONIZE).toBe(false);
  });

  it('should default schema sync off in production', () => {
    expect(validateEnv({ NODE_ENV: 'production' }).DB_SYNCHRONIZE).toBe(false);
    expect(
      validateEnv({ NODE_ENV: 'production', DB_SYNCHRONIZE: 'true' })
        .DB_SYNCHRONIZE,
    ).toBe(true);
  });

  it('should accept an allowed CORS origin', () => {
    expect(
      validateEnv({ CORS_ORIGIN: 'https://admin.example.test' }).CORS_ORIGIN,
    ).toBe('https://admin.example.test');
  });

  it('should accept the SQLite driver', () => {
    const env = validateEnv({
      DB_TYPE: 'better-sqlite3',
      DB_SQLITE_PATH: '/var/lib/d0010/flows.sqlite',
    });

    expect(env.DB_TYPE).toBe('better-sqlite3');
    expect(env.DB_SQLITE_PATH).toBe('/var/lib/d0010/flows.sqlite');
  });

  it('should list every invalid variable', () => {
    expect(() =>
      validateEnv({ PORT: 'abc', DB_TYPE: 'mysql', DB_SYNCHRONIZE: 'yes' }),
    ).toThrow(/^Invalid environment configuration: PORT: .*; DB_TYPE: .*; DB_SYNCHRONIZE: /);
  });
});
