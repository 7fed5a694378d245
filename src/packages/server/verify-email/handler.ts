/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
The verification request pipeline:

  parse event -> resolve API key -> build links -> send -> (record) -> respond

Each step returns a Result; the first failure decides the response.  Nothing
is retried and nothing is deduplicated: a redelivered event sends another
email (and inserts another row).
*/

import getLogger from "@signup-mailer/backend/logger";
import type { Context } from "aws-lambda";
import type { VerifyEmailConfig } from "./config";
import type { CredentialStrategy } from "./credentials";
import { errorMessage, ok, Result, VerifyEmailError } from "./errors";
import buildLinks, { deriveToken } from "./link";
import notify, { SendEmail } from "./notify";
import parseEvent, { RequestKind, VerificationRequest } from "./parse-event";
import {
  noPersistence,
  PersistenceStrategy,
  VerificationRecord,
} from "./record";

const logger = getLogger("verify-email:handler");

export const SUCCESS_MESSAGE = "Verification email sent successfully";
export const INTERNAL_ERROR_MESSAGE = "Internal error";

export interface VerifyEmailResponse {
  statusCode: 200 | 400 | 500;
  body: string;
}

export type VerifyEmailHandler = (
  event: unknown,
  context?: Pick<Context, "awsRequestId">,
) => Promise<VerifyEmailResponse>;

export interface VerifyEmailOptions {
  config: VerifyEmailConfig;
  credentials: CredentialStrategy;
  persistence?: PersistenceStrategy;
  send?: SendEmail;
  now?: () => Date;
}

// The body keeps the ": " separator after the key; clients compare it verbatim.
export function respond(
  statusCode: VerifyEmailResponse["statusCode"],
  message: string,
): VerifyEmailResponse {
  return { statusCode, body: `{"message": ${JSON.stringify(message)}}` };
}

export function redactToken(token: string): string {
  return token.length <= 4 ? "****" : `${token.slice(0, 4)}...`;
}

function describeRequest(request: VerificationRequest): string {
  return request.kind == "token"
    ? `email=${request.email} token=${redactToken(request.token)}`
    : `email=${request.email} user_id=${request.userId}`;
}

function logFailure(error: VerifyEmailError): void {
  const cause = error.cause == null ? "" : ` -- ${errorMessage(error.cause)}`;
  logger.error(`${error.name}: ${error.message}${cause}`);
}

export default function createVerifyEmailHandler({
  config,
  credentials,
  persistence = noPersistence,
  send,
  now = () => new Date(),
}: VerifyEmailOptions): VerifyEmailHandler {
  // stateful deployments get a user id and derive the token themselves
  const kind: RequestKind = persistence.kind == "relational" ? "user" : "token";

  async function run(event: unknown): Promise<Result<void>> {
    const parsed = parseEvent(event, kind);
    if (!parsed.ok) {
      return parsed;
    }
    const { source, request } = parsed.value;
    logger.info(`Received ${source} event: ${describeRequest(request)}`);

    const apiKey = await credentials.resolve();
    if (!apiKey.ok) {
      return apiKey;
    }

    // the row to insert, for requests that derive their own token
    let record: VerificationRecord | undefined = undefined;
    let token: string;
    if (request.kind == "user") {
      const derived = deriveToken(request.userId, now());
      token = derived.token;
      record = {
        user_id: request.userId,
        email: request.email,
        verification_token: derived.token,
        expiration_time: derived.expiresAt,
        is_verified: false,
      };
    } else {
      token = request.token;
    }
    const links = buildLinks(config, token);
    if (!links.ok) {
      return links;
    }
    logger.info(`Constructed verification link for email: ${request.email}`);

    const sent = await notify({
      config,
      apiKey: apiKey.value,
      email: request.email,
      links: links.value,
      send,
    });
    if (!sent.ok) {
      return sent;
    }

    if (record != null && persistence.kind == "relational") {
      const recorded = await persistence.record(record);
      if (!recorded.ok) {
        return recorded;
      }
    }
    return ok(undefined);
  }

  return async (event, context) => {
    if (event != null && typeof event == "object") {
      logger.debug(
        `request ${context?.awsRequestId ?? "-"}: event keys`,
        Object.keys(event),
      );
    }
    let result: Result<void>;
    try {
      result = await run(event);
    } catch (err) {
      // a strategy broke its contract and threw
      logger.error(`unexpected error: ${errorMessage(err)}`);
      return respond(500, INTERNAL_ERROR_MESSAGE);
    }
    if (!result.ok) {
      logFailure(result.error);
      return respond(result.error.statusCode, result.error.publicMessage);
    }
    return respond(200, SUCCESS_MESSAGE);
  };
}
