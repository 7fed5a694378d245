/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Stateless verification mailer: the caller supplies the token, the Sendgrid
key is in SENDGRID_API_KEY, links default to http.
*/

import { loadConfig } from "../config";
import { environmentCredential } from "../credentials";
import createVerifyEmailHandler from "../handler";

export const handler = createVerifyEmailHandler({
  config: loadConfig(process.env, { scheme: "http" }),
  credentials: environmentCredential(),
});
