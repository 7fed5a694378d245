/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import type { Message } from "@signup-mailer/backend/email/message";
import type { VerifyEmailConfig } from "./config";
import { EXPIRY_MINUTES, Links } from "./link";

export const SUBJECT = "Verify Your Email Address";

export function listUnsubscribe(
  config: VerifyEmailConfig,
  links: Links,
): string {
  return `<mailto:${config.unsubscribeMailbox}>, <${links.unsubscribe}>`;
}

function getText(config: VerifyEmailConfig, links: Links): string {
  return `
Dear User,

Thank you for signing up. Please verify your email address by clicking the link below:
${links.verify}

This link will expire in ${EXPIRY_MINUTES} minutes. If you did not sign up, please ignore this email.

To manage your email preferences or unsubscribe, please visit:
${links.unsubscribe}

Regards,
${config.teamName}
`;
}

function getHtml(config: VerifyEmailConfig, links: Links): string {
  return `
<html>
    <body>
        <p>Dear User,</p>
        <p>Thank you for signing up. Please verify your email address by clicking the link below:</p>
        <p><a href="${links.verify}">${links.verify}</a></p>
        <p>This link will expire in ${EXPIRY_MINUTES} minutes. If you did not sign up, please ignore this email.</p>
        <p>To manage your email preferences or unsubscribe, please click <a href="${links.unsubscribe}">here</a>.</p>
        <p>Regards,<br>${config.teamName}</p>
    </body>
</html>
`;
}

export default function verificationMessage(
  config: VerifyEmailConfig,
  to: string,
  links: Links,
): Message {
  return {
    from: config.sender,
    to,
    subject: SUBJECT,
    text: getText(config, links),
    html: getHtml(config, links),
    headers: { "List-Unsubscribe": listUnsubscribe(config, links) },
    categories: ["verify"],
  };
}
