/**
 * Authenticated, per-cluster sessions
 */

import { AuthError, errorMessage } from "../core/errors";
import type { ClusterClient, ClusterCredentials, ClusterRole } from "../types";
import { logger } from "../utils/logger";

export interface ClusterSession {
  readonly role: ClusterRole;
  readonly endpoint: string;
  readonly insecureSkipTlsVerify: boolean;
  /** Identity reported by the cluster after login */
  readonly user: string;
  readonly client: ClusterClient;
}

/**
 * Whether credentials carry enough to attempt a login
 */
export function hasLoginCredentials(credentials: ClusterCredentials): boolean {
  if (!credentials.endpoint) {
    return false;
  }
  return Boolean(credentials.token) || Boolean(credentials.username && credentials.password);
}

/**
 * Log in and prove the session is usable.
 *
 * A login that succeeds is not enough: the session must also answer an
 * identity check and list API resources, otherwise it is rejected.
 */
export async function openSession(
  role: ClusterRole,
  credentials: ClusterCredentials,
  client: ClusterClient,
): Promise<ClusterSession> {
  if (!credentials.endpoint || !hasLoginCredentials(credentials)) {
    throw new AuthError(`No usable ${role} credentials (need an API URL plus a token or user/pass)`, {
      incomplete: true,
    });
  }

  const method = credentials.token ? "token" : "username/password";
  logger.debug(`Logging in to ${role} cluster ${credentials.endpoint} with ${method}`);

  try {
    await client.login(credentials);
  } catch (error) {
    throw new AuthError(`Login to ${role} cluster ${credentials.endpoint} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let user: string;
  try {
    user = await client.whoami();
    await client.listApiResources();
  } catch (error) {
    throw new AuthError(
      `The ${role} session at ${credentials.endpoint} failed its liveness check: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  logger.info(`${role} login validated (${user} @ ${credentials.endpoint})`);

  return {
    role,
    endpoint: credentials.endpoint,
    insecureSkipTlsVerify: credentials.insecureSkipTlsVerify,
    user,
    client,
  };
}
