/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Every way a verification request can fail.  Each kind knows the status code
and the short message the caller gets to see; the underlying error is kept
as `cause` for the logs only.
*/

export type ErrorKind =
  | "validation"
  | "credential"
  | "link"
  | "delivery"
  | "persistence";

export abstract class VerifyEmailError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: 400 | 500;
  abstract readonly publicMessage: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends VerifyEmailError {
  readonly kind = "validation";
  readonly statusCode = 400;
  readonly publicMessage = "Invalid event format";
}

export class CredentialError extends VerifyEmailError {
  readonly kind = "credential";
  readonly statusCode = 500;
  readonly publicMessage = "Failed to retrieve email credentials";
}

export class LinkConstructionError extends VerifyEmailError {
  readonly kind = "link";
  readonly statusCode = 500;
  readonly publicMessage = "Failed to construct verification link";
}

export class DeliveryError extends VerifyEmailError {
  readonly kind = "delivery";
  readonly statusCode = 500;
  readonly publicMessage = "Failed to send verification email";
}

export class PersistenceError extends VerifyEmailError {
  readonly kind = "persistence";
  readonly statusCode = 500;
  readonly publicMessage = "Failed to log email in database";
}

export type Result<T, E extends VerifyEmailError = VerifyEmailError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends VerifyEmailError>(
  error: E,
): { ok: false; error: E } {
  return { ok: false, error };
}

// Message of whatever was thrown, for log lines.
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : `${err}`;
}
