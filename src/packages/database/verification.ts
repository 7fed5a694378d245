/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Rows of the email_verification table:

  user_id             -- whatever id the signup service gave the user
  email               -- address the link was sent to
  verification_token  -- the token embedded in the link
  expiration_time     -- UTC; stored, but not enforced by the mailer
  is_verified         -- always false when inserted here
*/

import getLogger from "@signup-mailer/backend/logger";
import type { Client } from "pg";
import getClient from "./client";

const L = getLogger("db:verification");

export interface VerificationRecord {
  user_id: string | number;
  email: string;
  verification_token: string;
  expiration_time: Date;
  is_verified: boolean;
}

export const INSERT_VERIFICATION = `
  INSERT INTO email_verification (user_id, email, verification_token, expiration_time, is_verified)
  VALUES ($1, $2, $3, $4, $5)
`;

// Opens a connection, inserts the record in its own transaction and closes
// the connection again, whether or not the insert worked.
export async function insertVerificationRecord(
  record: VerificationRecord,
  createClient: () => Client = getClient,
): Promise<void> {
  const client = createClient();
  try {
    await client.connect();
    await client.query("BEGIN");
    try {
      await client.query(INSERT_VERIFICATION, [
        record.user_id,
        record.email,
        record.verification_token,
        record.expiration_time,
        record.is_verified,
      ]);
      await client.query("COMMIT");
    } catch (err) {
      await rollback(client);
      throw err;
    }
  } finally {
    await closeClient(client);
  }
  L.debug("inserted verification record for user_id", record.user_id);
}

// end() after a failed connect() may reject too; the original error wins
async function closeClient(client: Client): Promise<void> {
  try {
    await client.end();
  } catch (err) {
    L.warn(`closing the connection failed -- ${err}`);
  }
}

async function rollback(client: Client): Promise<void> {
  try {
    await client.query("ROLLBACK");
  } catch (err) {
    // the insert error is the one worth reporting
    L.warn(`ROLLBACK failed -- ${err}`);
  }
}
