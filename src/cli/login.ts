/**
 * Cluster login with an interactive fallback
 */

import { AuthError } from "../core/errors";
import { type ClusterSession, openSession } from "../kube/session";
import type { ClusterClient, ClusterCredentials, ClusterRole } from "../types";
import { ui } from "./ui";

/**
 * Ask for credentials. Returns null when the user aborts.
 */
export async function promptCredentials(
  role: ClusterRole,
  previous: ClusterCredentials,
): Promise<ClusterCredentials | null> {
  const method = await ui.select({
    message: `${role} login`,
    options: [
      { value: "token", label: "Token" },
      { value: "password", label: "Username/Password" },
      { value: "abort", label: "Abort" },
    ],
  });
  if (ui.isCancel(method) || method === "abort") {
    return null;
  }

  const endpoint = await ui.text({
    message: "API URL",
    placeholder: "https://api.cluster:6443",
    initialValue: previous.endpoint,
    validate: (value) => (value.trim() === "" ? "API URL is required" : undefined),
  });
  if (ui.isCancel(endpoint)) {
    return null;
  }

  const credentials: ClusterCredentials = {
    endpoint: endpoint.trim(),
    insecureSkipTlsVerify: false,
  };

  if (method === "token") {
    const token = await ui.password({ message: "Bearer token" });
    if (ui.isCancel(token)) {
      return null;
    }
    credentials.token = token;
  } else {
    const username = await ui.text({ message: "Username", initialValue: previous.username });
    if (ui.isCancel(username)) {
      return null;
    }
    const password = await ui.password({ message: "Password" });
    if (ui.isCancel(password)) {
      return null;
    }
    credentials.username = username;
    credentials.password = password;
  }

  const insecure = await ui.confirm({ message: "Skip TLS verify?", initialValue: false });
  if (ui.isCancel(insecure)) {
    return null;
  }
  credentials.insecureSkipTlsVerify = insecure;

  return credentials;
}

export type CredentialsPrompt = typeof promptCredentials;

/**
 * Open a session from file credentials, prompting again on every failed
 * attempt when interactive. Non-interactive failures are fatal.
 */
export async function establishSession(
  role: ClusterRole,
  credentials: ClusterCredentials,
  client: ClusterClient,
  options: { interactive: boolean; prompt?: CredentialsPrompt },
): Promise<ClusterSession> {
  const prompt = options.prompt ?? promptCredentials;
  let current = credentials;

  for (;;) {
    try {
      return await openSession(role, current, client);
    } catch (error) {
      if (!(error instanceof AuthError) || !options.interactive) {
        throw error;
      }
      ui.warn(error.message);
    }

    const next = await prompt(role, current);
    if (!next) {
      throw new AuthError(`${role} login aborted`);
    }
    current = next;
  }
}
