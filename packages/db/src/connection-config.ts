/**
 * Connection settings for a JWT-authenticated cluster.
 *
 * The id_token is sent as the password and the cluster is told to accept it
 * through the `--crdb:jwt_auth_enabled=true` startup option. TLS always
 * verifies the server against the configured root certificate.
 */

import type { RuntimeConfig } from '@fundsflow/config';

export const JWT_AUTH_STARTUP_OPTION = '--crdb:jwt_auth_enabled=true';

export interface DbConfig {
    host: string;
    port: number;
    database: string;
    user: string;
    sslRootCertPath: string;
    applicationName: string;
    connectTimeoutSeconds: number;
}

export interface ConnectionOptions {
    host: string;
    port: number;
    database: string;
    username: string;
    password: string;
    ssl: { ca: string; rejectUnauthorized: boolean };
    /** A single logical connection; this is not a pool. */
    max: number;
    connect_timeout: number;
    connection: { application_name: string; options: string };
}

export function loadDbConfig(runtime: RuntimeConfig): DbConfig {
    return {
        host: runtime.DB_HOST,
        port: runtime.DB_PORT,
        database: runtime.DB_NAME,
        user: runtime.DB_USER,
        sslRootCertPath: runtime.DB_SSL_ROOT_CERT,
        applicationName: runtime.DB_APPLICATION_NAME,
        connectTimeoutSeconds: runtime.DB_CONNECT_TIMEOUT_SECONDS
    };
}

export function buildConnectionOptions(config: DbConfig, idToken: string, rootCert: string): ConnectionOptions {
    return {
        host: config.host,
        port: config.port,
        database: config.database,
        username: config.user,
        password: idToken,
        ssl: { ca: rootCert, rejectUnauthorized: true },
        max: 1,
        connect_timeout: config.connectTimeoutSeconds,
        connection: {
            application_name: config.applicationName,
            options: JWT_AUTH_STARTUP_OPTION
        }
    };
}

/** Connection target safe to log: no credentials. */
export function describeTarget(config: DbConfig): Record<string, unknown> {
    return {
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        applicationName: config.applicationName
    };
}
