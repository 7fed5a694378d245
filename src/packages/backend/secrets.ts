/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

/*
Read a secret from AWS Secrets Manager.

The client is created once per process, but the secret itself is fetched on
every call: a rotated key must be picked up by the next invocation.
*/

import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from "@aws-sdk/client-secrets-manager";
import getLogger from "./logger";

const logger = getLogger("secrets");

let client: SecretsManagerClient | undefined = undefined;
function getClient(): SecretsManagerClient {
  if (client == null) {
    client = new SecretsManagerClient({ region: process.env.AWS_REGION });
  }
  return client;
}

export interface SecretOptions {
  // when the secret is a JSON object, return this field of it
  field?: string;
}

export default async function getSecret(
  secretId: string,
  { field }: SecretOptions = {},
): Promise<string> {
  logger.debug("getSecret", { secretId, field });
  const { SecretString } = await getClient().send(
    new GetSecretValueCommand({ SecretId: secretId }),
  );
  if (!SecretString) {
    throw Error(`secret '${secretId}' has no string value`);
  }
  if (field == null) {
    return SecretString;
  }
  return secretField(secretId, SecretString, field);
}

function secretField(secretId: string, secret: string, field: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secret);
  } catch (err) {
    throw Error(`secret '${secretId}' is not JSON, so it has no field '${field}'`, {
      cause: err,
    });
  }
  if (parsed == null || typeof parsed != "object") {
    throw Error(`secret '${secretId}' is not a JSON object`);
  }
  const value: unknown = Reflect.get(parsed, field);
  if (typeof value != "string" || !value) {
    throw Error(`secret '${secretId}' has no string field '${field}'`);
  }
  return value;
}
