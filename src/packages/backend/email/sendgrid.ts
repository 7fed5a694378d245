/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/* We use the official V3 Sendgrid API:

https://www.npmjs.com/package/@sendgrid/mail

The API key is passed in on every call and never kept around by us; the
caller resolves it per invocation.
*/

import sgMail from "@sendgrid/mail";
import getLogger from "@signup-mailer/backend/logger";
import type { Message } from "./message";

const logger = getLogger("email:sendgrid");

// What Sendgrid answered.  A 202 means the message was queued for delivery,
// nothing more.
export interface SendResponse {
  statusCode: number;
  body: unknown;
  headers: unknown;
}

export const ACCEPTED = 202;

export default async function sendEmail(
  apiKey: string,
  message: Message,
): Promise<SendResponse> {
  sgMail.setApiKey(apiKey);
  const [response] = await sgMail.send({
    to: message.to,
    from: message.from,
    subject: message.subject,
    text: message.text,
    html: message.html,
    headers: message.headers,
    categories: message.categories,
  });
  logger.debug("sendgrid response headers", response.headers);
  return {
    statusCode: response.statusCode,
    body: response.body,
    headers: response.headers,
  };
}
