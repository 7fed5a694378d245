/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import type { Message } from "@signup-mailer/backend/email/message";
import sendEmail, {
  ACCEPTED,
  SendResponse,
} from "@signup-mailer/backend/email/sendgrid";
import getLogger from "@signup-mailer/backend/logger";
import type { VerifyEmailConfig } from "./config";
import { DeliveryError, fail, ok, Result } from "./errors";
import type { Links } from "./link";
import verificationMessage from "./message";

const logger = getLogger("verify-email:notify");

export type SendEmail = (
  apiKey: string,
  message: Message,
) => Promise<SendResponse>;

export interface NotifyOptions {
  config: VerifyEmailConfig;
  apiKey: string;
  email: string;
  links: Links;
  send?: SendEmail;
}

// @sendgrid/mail throws a ResponseError for 4xx/5xx answers, carrying the
// status as `code` and the parsed answer as `response.body`.
function rejection(err: unknown): { code: unknown; body: unknown } | undefined {
  if (!(err instanceof Error) || !("code" in err) || !("response" in err)) {
    return undefined;
  }
  const { response } = err;
  const body =
    response != null && typeof response == "object" && "body" in response
      ? response.body
      : undefined;
  return { code: err.code, body };
}

// Only a 202 counts: the message was queued.  Any other status, or anything
// thrown on the way, is a failed delivery.  There are no retries.
export default async function notify({
  config,
  apiKey,
  email,
  links,
  send = sendEmail,
}: NotifyOptions): Promise<Result<SendResponse, DeliveryError>> {
  const message = verificationMessage(config, email, links);
  let response: SendResponse;
  try {
    response = await send(apiKey, message);
  } catch (err) {
    const rejected = rejection(err);
    return fail(
      new DeliveryError(
        rejected == null
          ? "Exception when sending email"
          : `SendGrid API Error: ${rejected.code} - ${JSON.stringify(rejected.body)}`,
        { cause: err },
      ),
    );
  }
  logger.info(`Email sent to ${email}, status code: ${response.statusCode}`);
  if (response.statusCode != ACCEPTED) {
    return fail(
      new DeliveryError(
        `SendGrid API Error: ${response.statusCode} - ${JSON.stringify(response.body)}`,
      ),
    );
  }
  return ok(response);
}
