import { beforeEach, describe, expect, test } from "vitest";
import { AuthError } from "../../src/core/errors";
import { hasLoginCredentials, openSession } from "../../src/kube/session";
import { logger } from "../../src/utils/logger";
import { FakeCluster } from "../helpers/fake-cluster";

const credentials = {
  endpoint: "https://api.src.example:6443",
  token: "test-token",
  insecureSkipTlsVerify: false,
};

describe("openSession", () => {
  let cluster: FakeCluster;

  beforeEach(() => {
    cluster = new FakeCluster();
    logger.setLevel("error");
  });

  test("validates the login before returning a session", async () => {
    const session = await openSession("source", credentials, cluster);

    expect(session).toEqual({
      role: "source",
      endpoint: "https://api.src.example:6443",
      insecureSkipTlsVerify: false,
      user: "system:admin",
      client: cluster,
    });
    expect(cluster.calls.map((c) => c.method)).toEqual(["login", "whoami", "listApiResources"]);
  });

  test("flags incomplete credentials without trying to log in", async () => {
    const error = await openSession("destination", { insecureSkipTlsVerify: false }, cluster).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty("incomplete", true);
    expect(error).toHaveProperty("phase", "login");
    expect(cluster.calls).toHaveLength(0);
  });

  test("reports a rejected login", async () => {
    cluster.failOn("login", undefined, new Error("Unauthorized"));

    const error = await openSession("source", credentials, cluster).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty("incomplete", false);
    expect(error).toHaveProperty("message", "Login to source cluster https://api.src.example:6443 failed: Unauthorized");
  });

  test("rejects a session that cannot list API resources", async () => {
    cluster.failOn("listApiResources", undefined, new Error("forbidden"));

    await expect(openSession("source", credentials, cluster)).rejects.toThrow(
      "The source session at https://api.src.example:6443 failed its liveness check: forbidden",
    );
  });
});

describe("hasLoginCredentials", () => {
  test("needs an endpoint and a token or a full user/password pair", () => {
    expect(hasLoginCredentials(credentials)).toBe(true);
    expect(
      hasLoginCredentials({ endpoint: "https://a", username: "admin", password: "test-secret", insecureSkipTlsVerify: false }),
    ).toBe(true);
    expect(hasLoginCredentials({ endpoint: "https://a", username: "admin", insecureSkipTlsVerify: false })).toBe(false);
    expect(hasLoginCredentials({ token: "test-token", insecureSkipTlsVerify: false })).toBe(false);
  });
});
