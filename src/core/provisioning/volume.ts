/**
 * PersistentVolumeClaim and StorageClass operations
 */

import type { ClusterClient, KubeManifest, KubeObject, VolumeSpec } from "../../types";

export interface ClaimInfo {
  name: string;
  /** spec.resources.requests.storage */
  capacity?: string;
  accessModes: string[];
  volumeMode?: string;
  storageClassName?: string;
  /** status.phase, e.g. Bound or Pending */
  phase?: string;
}

const DEFAULT_CLASS_ANNOTATIONS = [
  "storageclass.kubernetes.io/is-default-class",
  "storageclass.beta.kubernetes.io/is-default-class",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): Record<string, unknown> {
  if (!isRecord(value)) return {};
  const next = value[key];
  return isRecord(next) ? next : {};
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function resourceName(resource: KubeObject): string | undefined {
  return nonEmptyString(child(resource, "metadata").name);
}

/**
 * Decode the fields of a claim the migration cares about
 */
export function decodeClaim(resource: KubeObject): ClaimInfo {
  const spec = child(resource, "spec");
  const requests = child(child(spec, "resources"), "requests");
  const modes = Array.isArray(spec.accessModes) ? spec.accessModes : [];

  return {
    name: resourceName(resource) ?? "",
    capacity: nonEmptyString(requests.storage),
    accessModes: modes.filter((mode): mode is string => typeof mode === "string" && mode !== ""),
    volumeMode: nonEmptyString(spec.volumeMode),
    storageClassName: nonEmptyString(spec.storageClassName),
    phase: nonEmptyString(child(resource, "status").phase),
  };
}

export async function inspectClaim(
  client: ClusterClient,
  namespace: string,
  name: string,
): Promise<ClaimInfo | null> {
  const resource = await client.get("pvc", name, namespace);
  return resource ? decodeClaim(resource) : null;
}

export function buildClaimManifest(namespace: string, name: string, spec: VolumeSpec): KubeManifest {
  return {
    apiVersion: "v1",
    kind: "PersistentVolumeClaim",
    metadata: { name, namespace },
    spec: {
      accessModes: [...spec.accessModes],
      resources: { requests: { storage: spec.capacity } },
      volumeMode: spec.volumeMode,
      ...(spec.storageClassName && { storageClassName: spec.storageClassName }),
    },
  };
}

export async function createClaim(
  client: ClusterClient,
  namespace: string,
  name: string,
  spec: VolumeSpec,
): Promise<void> {
  await client.apply(buildClaimManifest(namespace, name, spec));
}

export async function storageClassExists(client: ClusterClient, name: string): Promise<boolean> {
  return (await client.get("storageclass", name)) !== null;
}

export function isDefaultStorageClass(resource: KubeObject): boolean {
  const annotations = child(child(resource, "metadata"), "annotations");
  return DEFAULT_CLASS_ANNOTATIONS.some((key) => annotations[key] === "true");
}

/**
 * Name of the storage class marked as the cluster default, if any
 */
export async function findDefaultStorageClass(client: ClusterClient): Promise<string | undefined> {
  const classes = await client.list("storageclass");
  const found = classes.find(isDefaultStorageClass);
  return found ? resourceName(found) : undefined;
}
