/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Stateful verification mailer: gets a user_id, derives the token from it,
and records every accepted email in the email_verification table.
*/

import { databaseConfigFromEnv } from "@signup-mailer/backend/data";
import getClient from "@signup-mailer/database/client";
import { insertVerificationRecord } from "@signup-mailer/database/verification";
import { loadConfig } from "../config";
import { environmentCredential } from "../credentials";
import createVerifyEmailHandler from "../handler";
import { relationalPersistence } from "../record";

const database = databaseConfigFromEnv();

export const handler = createVerifyEmailHandler({
  config: loadConfig(process.env, { scheme: "https" }),
  credentials: environmentCredential(),
  persistence: relationalPersistence((record) =>
    insertVerificationRecord(record, () => getClient(database)),
  ),
});
