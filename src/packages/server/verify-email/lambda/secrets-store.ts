/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Stateless verification mailer that reads the Sendgrid key from AWS Secrets
Manager on every invocation.
*/

import { loadConfig } from "../config";
import {
  secretsStoreCredential,
  secretsStoreOptionsFromEnv,
} from "../credentials";
import createVerifyEmailHandler from "../handler";

export const handler = createVerifyEmailHandler({
  config: loadConfig(process.env, { scheme: "https" }),
  credentials: secretsStoreCredential(secretsStoreOptionsFromEnv()),
});
