/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Verification and unsubscribe links.

Tokens derived from a user id are "<user_id>:<ISO time of expiry>".  They are
NOT signed: anybody who knows a user id can write down a token that looks
valid for any expiry they like.  Whatever redeems these tokens must not trust
them on their own.
*/

import type { VerifyEmailConfig } from "./config";
import { fail, LinkConstructionError, ok, Result } from "./errors";

// How long a link is advertised to be valid.  Not enforced here.
export const EXPIRY_MINUTES = 2;

// unreserved characters plus the sub-delims and ":" "@" "/" that may appear
// in a query value without changing how it parses
const SAFE_QUERY_VALUE = /^[A-Za-z0-9\-._~:@/!$'()*,;]*$/;

export function encodeToken(token: string): string {
  return SAFE_QUERY_VALUE.test(token) ? token : encodeURIComponent(token);
}

function host({ domainPrefix, domain }: VerifyEmailConfig): string {
  return `${domainPrefix}${domain}`;
}

export function verificationURL(
  config: VerifyEmailConfig,
  token: string,
): string {
  return `${config.scheme}://${host(config)}/verify?token=${encodeToken(token)}`;
}

// always https, whatever scheme the verification link uses
export function unsubscribeURL(config: VerifyEmailConfig): string {
  return `https://${host(config)}/unsubscribe`;
}

export interface DerivedToken {
  token: string;
  expiresAt: Date;
}

export function deriveToken(
  userId: string | number,
  now: Date = new Date(),
): DerivedToken {
  const expiresAt = new Date(now.valueOf() + EXPIRY_MINUTES * 60 * 1000);
  return { token: `${userId}:${expiresAt.toISOString()}`, expiresAt };
}

export interface Links {
  verify: string;
  unsubscribe: string;
}

export default function buildLinks(
  config: VerifyEmailConfig,
  token: string,
): Result<Links, LinkConstructionError> {
  let links: Links;
  try {
    links = {
      verify: verificationURL(config, token),
      unsubscribe: unsubscribeURL(config),
    };
  } catch (err) {
    // encodeURIComponent throws on a lone surrogate
    return fail(
      new LinkConstructionError("the token cannot be put into a URL", {
        cause: err,
      }),
    );
  }
  for (const url of [links.verify, links.unsubscribe]) {
    try {
      new URL(url);
    } catch (err) {
      return fail(
        new LinkConstructionError(`'${host(config)}' does not give a valid URL`, {
          cause: err,
        }),
      );
    }
  }
  return ok(links);
}
