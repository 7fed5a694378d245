/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import { Client } from "pg";

import {
  DatabaseConfig,
  databaseConfigFromEnv,
} from "@signup-mailer/backend/data";
import getLogger from "@signup-mailer/backend/logger";

const L = getLogger("db:client");

// A fresh, unconnected client.  Functions run one request per invocation,
// so there is no pool: open, use and end a client within the request.
export default function getClient(
  config: DatabaseConfig = databaseConfigFromEnv(),
): Client {
  L.debug(
    `creating a new Client(host:${config.host}, port:${config.port}, database:${config.database}, user:${config.user})`,
  );
  return new Client(config);
}

export type { Client };
