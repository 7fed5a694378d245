/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Where the Sendgrid API key comes from.  A strategy is chosen when a function
is deployed, and resolves the key again on every invocation.
*/

import getSecret, { SecretOptions } from "@signup-mailer/backend/secrets";
import { CredentialError, fail, ok, Result } from "./errors";

export interface CredentialStrategy {
  // for log lines; never the key itself
  readonly source: string;
  resolve(): Promise<Result<string, CredentialError>>;
}

export const API_KEY_VARIABLE = "SENDGRID_API_KEY";

// Reads the key from an environment variable.  A variable that is not set
// at all is a deployment mistake, so that throws right away at cold start.
export function environmentCredential(
  variable: string = API_KEY_VARIABLE,
  env: NodeJS.ProcessEnv = process.env,
): CredentialStrategy {
  if (!env[variable]) {
    throw Error(`the environment variable ${variable} must be set`);
  }
  return {
    source: `env:${variable}`,
    resolve: async () => {
      const key = env[variable];
      if (!key) {
        return fail(new CredentialError(`${variable} is no longer set`));
      }
      return ok(key);
    },
  };
}

type FetchSecret = (secretId: string, options?: SecretOptions) => Promise<string>;

export interface SecretsStoreOptions {
  secretId: string;
  field?: string;
  fetchSecret?: FetchSecret;
}

export function secretsStoreCredential({
  secretId,
  field,
  fetchSecret = getSecret,
}: SecretsStoreOptions): CredentialStrategy {
  return {
    source: `secrets-manager:${secretId}`,
    resolve: async () => {
      try {
        return ok(await fetchSecret(secretId, { field }));
      } catch (err) {
        return fail(
          new CredentialError(`unable to read secret '${secretId}'`, {
            cause: err,
          }),
        );
      }
    },
  };
}

export const DEFAULT_SECRET_ID = "sendgrid/api-key";

export function secretsStoreOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SecretsStoreOptions {
  return {
    secretId: env.SENDGRID_API_KEY_SECRET_ID?.trim() || DEFAULT_SECRET_ID,
    field: env.SENDGRID_API_KEY_SECRET_FIELD?.trim() || undefined,
  };
}
