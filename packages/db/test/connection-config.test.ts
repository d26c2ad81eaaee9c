import { loadRuntimeConfig } from '@fundsflow/config';
import { describe, expect, it } from 'vitest';
import { buildConnectionOptions, describeTarget, loadDbConfig } from '../src/connection-config.js';

describe('buildConnectionOptions', () => {
  const config = loadDbConfig(loadRuntimeConfig({ NODE_ENV: 'test' }));

  it('maps runtime defaults to the db config', () => {
    expect(config).toEqual({
      host: 'lb',
      port: 26257,
      database: 'defaultdb',
      user: 'roach',
      sslRootCertPath: '/certs/ca.crt',
      applicationName: '$ using_jwt_token_postgresjs',
      connectTimeoutSeconds: 10
    });
  });

  it('sends the id token as password with jwt auth enabled', () => {
    expect(buildConnectionOptions(config, 'test-token', 'test-ca')).toEqual({
      host: 'lb',
      port: 26257,
      database: 'defaultdb',
      username: 'roach',
      password: 'test-token',
      ssl: { ca: 'test-ca', rejectUnauthorized: true },
      max: 1,
      connect_timeout: 10,
      connection: {
        application_name: '$ using_jwt_token_postgresjs',
        options: '--crdb:jwt_auth_enabled=true'
      }
    });
  });

  it('describes the target without credentials', () => {
    expect(describeTarget(config)).toEqual({
      host: 'lb',
      port: 26257,
      database: 'defaultdb',
      user: 'roach',
      applicationName: '$ using_jwt_token_postgresjs'
    });
  });
});
