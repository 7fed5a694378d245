/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Database connection settings.

Everything here is determined from environment variables when this module is
initialized.  The DB_* names are the ones the deployed functions are
configured with; the standard libpq PG* names are honored as a fallback.

- DB_HOST / PGHOST -- database host (default localhost)
- DB_PORT / PGPORT -- database port (default 5432)
- DB_USERNAME / PGUSER -- user (default postgres)
- DB_PASSWORD / PGPASSWORD -- password
- DB_NAME / PGDATABASE -- database (default postgres)
- DB_SSL, DB_SSL_CA_FILE, DB_SSL_CLIENT_CERT_FILE, DB_SSL_CLIENT_KEY_FILE,
  DB_SSL_CLIENT_KEY_PASSPHRASE -- TLS to the database
*/

import { readFileSync } from "fs";
import { isEmpty } from "lodash";
import { ConnectionOptions } from "node:tls";

import Dict = NodeJS.Dict;

// Each field value in this interface is to be treated as though it originated
// from a raw environment variable.
//
export interface SSLEnvConfig extends Dict<string> {
  DB_SSL?: string;
  DB_SSL_CA_FILE?: string;
  DB_SSL_CLIENT_CERT_FILE?: string;
  DB_SSL_CLIENT_KEY_FILE?: string;
  DB_SSL_CLIENT_KEY_PASSPHRASE?: string;
}

// A full list of property types and SSL config options can be found here:
//
// http://nodejs.org/api/tls.html#tls_tls_connect_options_callback
//
export type SSLConfig = ConnectionOptions | boolean;

/**
 * Converts the DB_SSL* environment variables into the SSL context expected
 * by node-postgres.  Certificate files are read eagerly, so a missing file
 * is reported at cold start.
 */
export function sslConfigFromEnv(env: SSLEnvConfig = process.env): SSLConfig {
  const sslConfig: ConnectionOptions = {};

  if (env.DB_SSL_CA_FILE) {
    sslConfig.ca = readFileSync(env.DB_SSL_CA_FILE);
  }

  if (env.DB_SSL_CLIENT_CERT_FILE) {
    sslConfig.cert = readFileSync(env.DB_SSL_CLIENT_CERT_FILE);
  }

  if (env.DB_SSL_CLIENT_KEY_FILE) {
    sslConfig.key = readFileSync(env.DB_SSL_CLIENT_KEY_FILE);
  }

  if (env.DB_SSL_CLIENT_KEY_PASSPHRASE) {
    sslConfig.passphrase = env.DB_SSL_CLIENT_KEY_PASSPHRASE;
  }

  return isEmpty(sslConfig) ? env.DB_SSL?.toLowerCase() === "true" : sslConfig;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
  ssl: SSLConfig;
}

export function databaseConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const port = parseInt(env.DB_PORT ?? env.PGPORT ?? "5432");
  if (isNaN(port)) {
    throw Error(`invalid database port '${env.DB_PORT ?? env.PGPORT}'`);
  }
  return {
    host: env.DB_HOST ?? env.PGHOST ?? "localhost",
    port,
    user: env.DB_USERNAME ?? env.PGUSER ?? "postgres",
    password: env.DB_PASSWORD ?? env.PGPASSWORD,
    database: env.DB_NAME ?? env.PGDATABASE ?? "postgres",
    ssl: sslConfigFromEnv(env),
  };
}
