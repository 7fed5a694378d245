/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Configuration of a verification mailer, built once when the function starts
and handed to the handler.  Nothing downstream reads the environment for
these values.
*/

export type Scheme = "http" | "https";

export interface VerifyEmailConfig {
  // scheme of the verification link
  scheme: Scheme;
  // e.g., "cloudjourney.me"
  domain: string;
  // "" or e.g. "staging." -- always ends in a dot when non-empty
  domainPrefix: string;
  // pre-registered sender address
  sender: string;
  // mailbox for the mailto: part of List-Unsubscribe
  unsubscribeMailbox: string;
  // sign-off line of the message
  teamName: string;
}

export const DEFAULTS = {
  domain: "cloudjourney.me",
  sender: "noreply@em7116.cloudjourney.me",
  unsubscribeMailbox: "unsubscribe@em7116.cloudjourney.me",
  teamName: "The CloudJourney Team",
} as const;

export function domainPrefix(envPrefix?: string): string {
  const prefix = (envPrefix ?? "").trim();
  return prefix ? `${prefix}.` : "";
}

export function parseScheme(value: string): Scheme {
  const scheme = value.trim().toLowerCase();
  if (scheme == "http" || scheme == "https") {
    return scheme;
  }
  throw Error(`VERIFY_LINK_SCHEME must be http or https, not '${value}'`);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  { scheme = "https" }: { scheme?: Scheme } = {},
): VerifyEmailConfig {
  return {
    scheme: env.VERIFY_LINK_SCHEME ? parseScheme(env.VERIFY_LINK_SCHEME) : scheme,
    domain: env.VERIFY_DOMAIN?.trim() || DEFAULTS.domain,
    domainPrefix: domainPrefix(env.ENV_PREFIX),
    sender: env.EMAIL_FROM?.trim() || DEFAULTS.sender,
    unsubscribeMailbox:
      env.EMAIL_UNSUBSCRIBE_MAILBOX?.trim() || DEFAULTS.unsubscribeMailbox,
    teamName: env.EMAIL_TEAM_NAME?.trim() || DEFAULTS.teamName,
  };
}
