/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Turn the raw Lambda event into a verification request.

Two shapes arrive here:

  - an SNS notification, { Records: [ { Sns: { Message: "<json>" } } ] }, and
  - a direct invocation, where the event itself is the payload.

Only the first record of an SNS notification is used.
*/

import { fail, ok, Result, ValidationError } from "./errors";

// Stateless requests carry the token; stateful ones only a user id, and the
// token is derived from it later.
export type VerificationRequest =
  | { kind: "token"; email: string; token: string }
  | { kind: "user"; email: string; userId: string | number };

export type RequestKind = VerificationRequest["kind"];

export type EventSource = "sns" | "direct";

export interface ParsedEvent {
  source: EventSource;
  request: VerificationRequest;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return x != null && typeof x == "object" && !Array.isArray(x);
}

interface ExtractedPayload {
  source: EventSource;
  payload: Record<string, unknown>;
}

export function extractPayload(
  event: unknown,
): Result<ExtractedPayload, ValidationError> {
  if (!isRecord(event)) {
    return fail(new ValidationError("event is not an object"));
  }
  if (!("Records" in event)) {
    return ok<ExtractedPayload>({ source: "direct", payload: event });
  }
  const { Records } = event;
  const first: unknown = Array.isArray(Records) ? Records[0] : undefined;
  const sns: unknown = isRecord(first) ? first.Sns : undefined;
  const message: unknown = isRecord(sns) ? sns.Message : undefined;
  if (typeof message != "string") {
    return fail(new ValidationError("Records[0].Sns.Message is missing"));
  }
  let payload: unknown;
  try {
    payload = JSON.parse(message);
  } catch (err) {
    return fail(
      new ValidationError("SNS message is not valid JSON", { cause: err }),
    );
  }
  if (!isRecord(payload)) {
    return fail(new ValidationError("SNS message is not a JSON object"));
  }
  return ok<ExtractedPayload>({ source: "sns", payload });
}

function nonEmptyString(x: unknown): x is string {
  return typeof x == "string" && x.length > 0;
}

function isUserId(x: unknown): x is string | number {
  return nonEmptyString(x) || Number.isSafeInteger(x);
}

export function parseRequest(
  payload: Record<string, unknown>,
  kind: RequestKind,
): Result<VerificationRequest, ValidationError> {
  const { email } = payload;
  if (kind == "token") {
    const token = payload.verification_token;
    if (!nonEmptyString(email) || !nonEmptyString(token)) {
      return fail(
        new ValidationError(
          "Missing required fields: email or verification_token",
        ),
      );
    }
    const request: VerificationRequest = { kind: "token", email, token };
    return ok(request);
  }
  const userId = payload.user_id;
  if (!nonEmptyString(email) || !isUserId(userId)) {
    return fail(new ValidationError("Missing required fields: email or user_id"));
  }
  const request: VerificationRequest = { kind: "user", email, userId };
  return ok(request);
}

export default function parseEvent(
  event: unknown,
  kind: RequestKind,
): Result<ParsedEvent, ValidationError> {
  const extracted = extractPayload(event);
  if (!extracted.ok) {
    return extracted;
  }
  const request = parseRequest(extracted.value.payload, kind);
  if (!request.ok) {
    return request;
  }
  return ok<ParsedEvent>({
    source: extracted.value.source,
    request: request.value,
  });
}
