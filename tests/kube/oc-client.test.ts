import { describe, expect, test } from "vitest";
import { commandExists } from "../../src/kube/client";
import { KubeCommandError, OcClusterClient, redact, renderManifest } from "../../src/kube/oc-client";
import type { CommandResult, CommandRunner, RunOptions } from "../../src/types";

interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

function fakeRunner(results: Partial<CommandResult>[] = []) {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, args, options = {}) => {
    calls.push({ command, args, options });
    return { success: true, stdout: "", stderr: "", exitCode: 0, ...results.shift() };
  };
  return { calls, runner };
}

function client(results: Partial<CommandResult>[] = []) {
  const { calls, runner } = fakeRunner(results);
  return { calls, oc: new OcClusterClient({ kubeconfig: "/tmp/run/kubeconfig-source", runner }) };
}

describe("OcClusterClient", () => {
  test("logs in with a token against its own kubeconfig", async () => {
    const { calls, oc } = client();

    await oc.login({ endpoint: "https://api.src.example:6443", token: "test-token", insecureSkipTlsVerify: false });

    expect(calls[0]?.command).toBe("oc");
    expect(calls[0]?.args).toEqual([
      "login",
      "https://api.src.example:6443",
      "--token",
      "test-token",
      "--insecure-skip-tls-verify=false",
    ]);
    expect(calls[0]?.options.env).toEqual({ KUBECONFIG: "/tmp/run/kubeconfig-source" });
  });

  test("logs in with a username and password", async () => {
    const { calls, oc } = client();

    await oc.login({
      endpoint: "https://api.dst.example:6443",
      username: "admin",
      password: "test-secret",
      insecureSkipTlsVerify: true,
    });

    expect(calls[0]?.args).toEqual([
      "login",
      "https://api.dst.example:6443",
      "-u",
      "admin",
      "-p",
      "test-secret",
      "--insecure-skip-tls-verify=true",
    ]);
  });

  test("keeps secrets out of command errors", async () => {
    const { oc } = client([{ success: false, exitCode: 1, stderr: "error: Unauthorized" }]);

    const error = await oc
      .login({ endpoint: "https://api.src.example:6443", token: "test-token", insecureSkipTlsVerify: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(KubeCommandError);
    expect(error).toHaveProperty(
      "message",
      "oc login https://api.src.example:6443 --token *** --insecure-skip-tls-verify=false failed (exit 1): error: Unauthorized",
    );
  });

  test("get returns null for a missing object", async () => {
    const { oc } = client([{ success: false, exitCode: 1, stderr: 'Error from server (NotFound): pods "x" not found' }]);

    expect(await oc.get("pod", "x", "ns-a")).toBeNull();
  });

  test("get throws on other failures", async () => {
    const { oc } = client([{ success: false, exitCode: 1, stderr: "Unable to connect to the server" }]);

    await expect(oc.get("pod", "x", "ns-a")).rejects.toBeInstanceOf(KubeCommandError);
  });

  test("get parses the object", async () => {
    const { calls, oc } = client([{ stdout: '{"kind":"Pod","metadata":{"name":"x"}}' }]);

    expect(await oc.get("pod", "x", "ns-a")).toEqual({ kind: "Pod", metadata: { name: "x" } });
    expect(calls[0]?.args).toEqual(["-n", "ns-a", "get", "pod", "x", "-o", "json"]);
  });

  test("list returns the items of a cluster-scoped kind", async () => {
    const { calls, oc } = client([{ stdout: '{"items":[{"metadata":{"name":"fast"}},"junk"]}' }]);

    expect(await oc.list("storageclass")).toEqual([{ metadata: { name: "fast" } }]);
    expect(calls[0]?.args).toEqual(["get", "storageclass", "-o", "json"]);
  });

  test("applies manifests as YAML on stdin", async () => {
    const { calls, oc } = client();

    await oc.apply({ apiVersion: "v1", kind: "Pod", metadata: { name: "p", namespace: "ns-b" } });

    expect(calls[0]?.args).toEqual(["-n", "ns-b", "apply", "-f", "-"]);
    expect(calls[0]?.options.input).toBe("apiVersion: v1\nkind: Pod\nmetadata:\n  name: p\n  namespace: ns-b\n");
  });

  test("deletes without waiting by default", async () => {
    const { calls, oc } = client();

    await oc.delete("pod", "p", "ns-a");
    await oc.delete("automationcontrollerbackup", "controller-backup", "ns-a", { wait: true });

    expect(calls.map((c) => c.args)).toEqual([
      ["-n", "ns-a", "delete", "pod", "p", "--ignore-not-found", "--wait=false"],
      ["-n", "ns-a", "delete", "automationcontrollerbackup", "controller-backup", "--ignore-not-found", "--wait=true"],
    ]);
  });

  test("waits for a condition with a timeout", async () => {
    const { calls, oc } = client();

    await oc.waitForCondition("pod", "p", "ns-a", "Ready", 300);

    expect(calls[0]?.args).toEqual(["-n", "ns-a", "wait", "--for=condition=Ready", "pod/p", "--timeout=300s"]);
  });

  test("runs scripts through sh -lc", async () => {
    const { calls, oc } = client([{ stdout: "10000\t/backups" }, {}]);

    expect(await oc.exec("ns-a", "p", "du -s /backups")).toBe("10000\t/backups");
    await oc.execToFile("ns-a", "p", "tar cf - b1", "/tmp/run/payload.tar");

    expect(calls[0]?.args).toEqual(["-n", "ns-a", "exec", "p", "--", "sh", "-lc", "du -s /backups"]);
    expect(calls[1]?.options.stdoutFile).toBe("/tmp/run/payload.tar");
  });

  test("copies and syncs with pod-qualified paths", async () => {
    const { calls, oc } = client();

    await oc.copyToPod("ns-b", "dst", "/tmp/run/payload.tar", "/tmp/payload.tar");
    await oc.syncFromPod("ns-a", "src", "/backups/b1", "/tmp/run/tmp_copy");
    await oc.syncToPod("ns-b", "dst", "/tmp/run/tmp_copy/b1", "/backups");

    expect(calls.map((c) => c.args)).toEqual([
      ["-n", "ns-b", "cp", "/tmp/run/payload.tar", "dst:/tmp/payload.tar"],
      ["-n", "ns-a", "rsync", "src:/backups/b1", "/tmp/run/tmp_copy/"],
      ["-n", "ns-b", "rsync", "/tmp/run/tmp_copy/b1", "dst:/backups/"],
    ]);
  });

  test("namespaceExists reflects the exit status", async () => {
    const { oc } = client([{}, { success: false, exitCode: 1 }]);

    expect(await oc.namespaceExists("ns-a")).toBe(true);
    expect(await oc.namespaceExists("ns-z")).toBe(false);
  });
});

describe("redact", () => {
  test("masks tokens and passwords only", () => {
    expect(redact(["login", "https://a", "-u", "admin", "-p", "test-secret"])).toEqual([
      "login",
      "https://a",
      "-u",
      "admin",
      "-p",
      "***",
    ]);
  });
});

describe("renderManifest", () => {
  test("renders nested specs", () => {
    expect(
      renderManifest({
        apiVersion: "v1",
        kind: "PersistentVolumeClaim",
        metadata: { name: "c" },
        spec: { accessModes: ["ReadWriteOnce"] },
      }),
    ).toBe("apiVersion: v1\nkind: PersistentVolumeClaim\nmetadata:\n  name: c\nspec:\n  accessModes:\n    - ReadWriteOnce\n");
  });
});

describe("commandExists", () => {
  test("is false for a binary that is not installed", async () => {
    expect(await commandExists("pvc-migrate-test-no-such-binary")).toBe(false);
  });
});
