/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Whether (and where) a sent verification gets recorded.

The record is written only after Sendgrid accepted the message, and the two
steps are not one transaction: if the insert fails, the user already has a
working link but the caller is told the request failed.  If the function dies
between the two steps, the row is simply never written.
*/

import {
  insertVerificationRecord,
  VerificationRecord,
} from "@signup-mailer/database/verification";
import getLogger from "@signup-mailer/backend/logger";
import { fail, ok, PersistenceError, Result } from "./errors";

const logger = getLogger("verify-email:record");

export type { VerificationRecord };

export type PersistenceStrategy =
  | { kind: "none" }
  | {
      kind: "relational";
      record: (
        record: VerificationRecord,
      ) => Promise<Result<void, PersistenceError>>;
    };

export const noPersistence: PersistenceStrategy = { kind: "none" };

export function relationalPersistence(
  insert: (record: VerificationRecord) => Promise<void> = (record) =>
    insertVerificationRecord(record),
): PersistenceStrategy {
  return {
    kind: "relational",
    record: async (record) => {
      try {
        await insert(record);
      } catch (err) {
        return fail(
          new PersistenceError("inserting the verification record failed", {
            cause: err,
          }),
        );
      }
      logger.info("Email logged successfully for user_id:", record.user_id);
      return ok(undefined);
    },
  };
}
