import { beforeEach, describe, expect, test, vi } from "vitest";
import { buildMigrationRequest } from "../../src/config/mapping";
import { MigrationCancelledError, ResourceTimeoutError } from "../../src/core/errors";
import {
  BACKUP_KIND,
  BACKUP_NAME,
  buildBackupManifest,
  buildRestoreManifest,
  extractBackupOutcome,
  RESTORE_KIND,
  RESTORE_NAME,
  restoreDirectory,
  runBackupPhase,
  runRestorePhase,
} from "../../src/core/phase";
import { logger } from "../../src/utils/logger";
import { FakeClock } from "../helpers/fake-clock";
import { FakeCluster, successfulCondition } from "../helpers/fake-cluster";

const request = buildMigrationRequest({ sourceNamespace: "ns-a", destinationNamespace: "ns-b" });

describe("backup phase", () => {
  let cluster: FakeCluster;
  let clock: FakeClock;
  const options = () => ({ timeoutMs: 30_000, intervalMs: 10_000, clock });

  beforeEach(() => {
    cluster = new FakeCluster();
    clock = new FakeClock();
    logger.setLevel("error");
  });

  test("builds the backup manifest", () => {
    expect(buildBackupManifest("ns-a", "controller")).toEqual({
      apiVersion: "automationcontroller.ansible.com/v1beta1",
      kind: "AutomationControllerBackup",
      metadata: { name: "controller-backup", namespace: "ns-a" },
      spec: {
        no_log: true,
        image_pull_policy: "IfNotPresent",
        set_self_labels: true,
        deployment_name: "controller",
      },
    });
  });

  test("deletes an existing backup and waits for the deletion before creating", async () => {
    cluster.putManifest(buildBackupManifest("ns-a", "controller"));
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [
      { ...successfulCondition(), backupDirectory: "/backups/b1", backupClaim: "controller-backup-claim" },
    ]);

    const outcome = await runBackupPhase(cluster, request, options());

    expect(cluster.calls.map((c) => c.method)).toEqual(["get", "delete", "apply", "get"]);
    expect(cluster.callsTo("delete")[0]?.args).toEqual([BACKUP_KIND, BACKUP_NAME, "ns-a", { wait: true }]);
    expect(outcome).toEqual({ backupDirectory: "/backups/b1", backupClaim: "controller-backup-claim" });
  });

  test("creates without deleting when no backup exists", async () => {
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [
      successfulCondition("Running", "Unknown"),
      { ...successfulCondition(), backupDirectory: "/backups/b2" },
    ]);

    await runBackupPhase(cluster, request, options());

    expect(cluster.callsTo("delete")).toHaveLength(0);
    expect(cluster.callsTo("apply")).toHaveLength(1);
    expect(clock.sleeps).toEqual([10_000]);
  });

  test("falls back to the operator mount and the default claim", () => {
    const outcome = extractBackupOutcome({ status: successfulCondition() }, request);

    expect(outcome).toEqual({ backupDirectory: "/backups", backupClaim: "controller-backup-claim" });
  });

  test("ignores the source mount path when falling back", () => {
    const custom = buildMigrationRequest({ sourceNamespace: "ns-a", destinationNamespace: "ns-b", sourcePath: "/data" });

    expect(extractBackupOutcome({ status: successfulCondition() }, custom).backupDirectory).toBe("/backups");
  });

  test("reports each state transition", async () => {
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [successfulCondition()]);
    const onTransition = vi.fn();

    await runBackupPhase(cluster, request, { ...options(), onTransition });

    expect(onTransition.mock.calls.map(([state]) => state)).toEqual(["submitted", "polling", "succeeded"]);
  });

  test("times out a backup reporting False and leaves it in place", async () => {
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [successfulCondition("Failed", "False")]);
    const onTransition = vi.fn();

    await expect(runBackupPhase(cluster, request, { ...options(), onTransition })).rejects.toBeInstanceOf(
      ResourceTimeoutError,
    );

    expect(onTransition).toHaveBeenLastCalledWith("timed-out", "Backup");
    expect(cluster.find(BACKUP_KIND, BACKUP_NAME, "ns-a")).toBeDefined();
  });

  test("marks a cancelled wait as failed", async () => {
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [successfulCondition("Running", "Unknown")]);
    const controller = new AbortController();
    controller.abort();
    const onTransition = vi.fn();

    await expect(
      runBackupPhase(cluster, request, { ...options(), signal: controller.signal, onTransition }),
    ).rejects.toBeInstanceOf(MigrationCancelledError);

    expect(onTransition).toHaveBeenLastCalledWith("failed", "Backup");
  });

  test("marks a backup that never finishes as timed out", async () => {
    cluster.scriptStatus(BACKUP_KIND, BACKUP_NAME, "ns-a", [successfulCondition("Running", "Unknown")]);
    const onTransition = vi.fn();

    await expect(runBackupPhase(cluster, request, { ...options(), onTransition })).rejects.toBeInstanceOf(
      ResourceTimeoutError,
    );

    expect(onTransition).toHaveBeenLastCalledWith("timed-out", "Backup");
  });
});

describe("restore phase", () => {
  let cluster: FakeCluster;
  let clock: FakeClock;

  beforeEach(() => {
    cluster = new FakeCluster();
    clock = new FakeClock();
    logger.setLevel("error");
  });

  test("builds the restore manifest", () => {
    const manifest = buildRestoreManifest({
      namespace: "ns-b",
      workloadIdentity: "controller",
      claimName: "controller-recovery-claim",
      backupDirectory: "/backups/2024-01-01",
    });

    expect(manifest.kind).toBe(RESTORE_KIND);
    expect(manifest.metadata).toEqual({ name: "aap-controller-restore", namespace: "ns-b" });
    expect(manifest.spec).toEqual({
      backup_dir: "/backups/2024-01-01",
      backup_pvc: "controller-recovery-claim",
      backup_source: "PVC",
      deployment_name: "controller",
      force_drop_db: false,
      image_pull_policy: "IfNotPresent",
      no_log: true,
      set_self_labels: true,
    });
  });

  test("places the backup directory under the operator's mount", () => {
    expect(restoreDirectory("/backups", "/backups/2024-01-01")).toBe("/backups/2024-01-01");
    expect(restoreDirectory("/backups", "/var/backups/b1/")).toBe("/backups/b1");
  });

  test("waits for restoreComplete as well as the condition", async () => {
    cluster.scriptStatus(RESTORE_KIND, RESTORE_NAME, "ns-b", [
      successfulCondition(),
      { ...successfulCondition(), restoreComplete: true },
    ]);

    const outcome = await runRestorePhase(
      cluster,
      request,
      "controller-recovery-claim",
      "/backups/2024-01-01",
      { timeoutMs: 30_000, intervalMs: 10_000, clock },
    );

    expect(outcome).toEqual({ restoreComplete: true });
    expect(clock.sleeps).toEqual([10_000]);
  });
});
